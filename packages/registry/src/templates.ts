import type { Identifier, Operand } from "./identifier.js";
import { namespace } from "./label.js";
import { expectNoOutput, expectOperands, expectOutput } from "./validate.js";

/**
 * Renders one gadget call. Renderers are pure: the same label, output and
 * operands always give the same text.
 */
export type Renderer = (
  label: string,
  output: Identifier | undefined,
  operands: readonly Operand[]
) => string;

export const renderWitness: Renderer = (label, output, operands) => {
  const [point] = expectOperands("Witness", operands);
  const out = expectOutput("Witness", output);
  return [
    `let ${out} = ecc::EdwardsPoint::witness(`,
    `    ${namespace(label, "Witness")},`,
    `    ${point}.map(jubjub::ExtendedPoint::from))?;`,
  ].join("\n");
};

export const renderAssertNotSmallOrder: Renderer = (label, output, operands) => {
  const [point] = expectOperands("AssertNotSmallOrder", operands);
  expectNoOutput("AssertNotSmallOrder", output);
  return `${point}.assert_not_small_order(${namespace(label, "AssertNotSmallOrder")})?;`;
};

export const renderFieldToBits: Renderer = (label, output, operands) => {
  const [fieldElement] = expectOperands("FieldToBits", operands);
  const out = expectOutput("FieldToBits", output);
  return [
    `let ${out} = boolean::field_into_boolean_vec_le(`,
    `    ${namespace(label, "FieldToBits")}, ${fieldElement})?;`,
  ].join("\n");
};

// fixed_base_multiplication takes the generator before the scalar bits.
export const renderFixedBaseScalarMul: Renderer = (label, output, operands) => {
  const [scalar, base] = expectOperands("FixedBaseScalarMul", operands);
  const out = expectOutput("FixedBaseScalarMul", output);
  return [
    `let ${out} = ecc::fixed_base_multiplication(`,
    `    ${namespace(label, "FixedBaseScalarMul")},`,
    `    &${base},`,
    `    &${scalar},`,
    `)?;`,
  ].join("\n");
};

export const renderPointAdd: Renderer = (label, output, operands) => {
  const [a, b] = expectOperands("PointAdd", operands);
  const out = expectOutput("PointAdd", output);
  return `let ${out} = ${a}.add(${namespace(label, "PointAdd")}, &${b})?;`;
};

export const renderExposeInput: Renderer = (label, output, operands) => {
  const [point] = expectOperands("ExposeInput", operands);
  expectNoOutput("ExposeInput", output);
  return `${point}.inputize(${namespace(label, "ExposeInput")})?;`;
};
