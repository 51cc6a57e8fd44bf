import { resolveKind, type OperationKind } from "./catalog.js";
import type { OperationRecord } from "./record.js";
import {
  renderAssertNotSmallOrder,
  renderExposeInput,
  renderFieldToBits,
  renderFixedBaseScalarMul,
  renderPointAdd,
  renderWitness,
  type Renderer,
} from "./templates.js";

export const RENDERERS: Readonly<Record<OperationKind, Renderer>> = Object.freeze({
  Witness: renderWitness,
  AssertNotSmallOrder: renderAssertNotSmallOrder,
  FieldToBits: renderFieldToBits,
  FixedBaseScalarMul: renderFixedBaseScalarMul,
  PointAdd: renderPointAdd,
  ExposeInput: renderExposeInput,
} satisfies Record<OperationKind, Renderer>);

export function lookupRenderer(name: string): Renderer {
  return RENDERERS[resolveKind(name)];
}

export function renderRecord(record: OperationRecord): string {
  const render = lookupRenderer(record.kind);
  return render(record.label, record.output, record.operands);
}
