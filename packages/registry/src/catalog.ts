import { UnresolvableKindError } from "./errors.js";

export const OPERATION_KINDS = [
  "Witness",
  "AssertNotSmallOrder",
  "FieldToBits",
  "FixedBaseScalarMul",
  "PointAdd",
  "ExposeInput",
] as const;

export type OperationKind = (typeof OPERATION_KINDS)[number];

export interface GadgetDescriptor {
  readonly kind: OperationKind;
  /** Operation name used by circuit descriptions written before the kinds were named. */
  readonly legacyName: string;
  /** Operand roles in the order renderers consume them. */
  readonly roles: readonly string[];
  /** Whether the gadget binds a new variable. */
  readonly produces: boolean;
  readonly description: string;
}

function descriptor(entry: GadgetDescriptor): GadgetDescriptor {
  return Object.freeze({ ...entry, roles: Object.freeze([...entry.roles]) });
}

export const GADGET_CATALOG: Readonly<Record<OperationKind, GadgetDescriptor>> = Object.freeze({
  Witness: descriptor({
    kind: "Witness",
    legacyName: "witness",
    roles: ["point"],
    produces: true,
    description: "witness an optional curve point and bind it as a circuit variable",
  }),
  AssertNotSmallOrder: descriptor({
    kind: "AssertNotSmallOrder",
    legacyName: "assert_not_small_order",
    roles: ["point"],
    produces: false,
    description: "constrain a point to not be of small order",
  }),
  FieldToBits: descriptor({
    kind: "FieldToBits",
    legacyName: "fr_as_binary_le",
    roles: ["field_element"],
    produces: true,
    description: "decompose a field element into little-endian boolean bits",
  }),
  FixedBaseScalarMul: descriptor({
    kind: "FixedBaseScalarMul",
    legacyName: "ec_mul_const",
    roles: ["scalar", "base"],
    produces: true,
    description: "multiply a fixed generator by a circuit scalar",
  }),
  PointAdd: descriptor({
    kind: "PointAdd",
    legacyName: "ec_add",
    roles: ["a", "b"],
    produces: true,
    description: "add two curve points",
  }),
  ExposeInput: descriptor({
    kind: "ExposeInput",
    legacyName: "emit_ec",
    roles: ["point"],
    produces: false,
    description: "expose a point as a public circuit input",
  }),
});

const KIND_BY_NAME: ReadonlyMap<string, OperationKind> = new Map(
  OPERATION_KINDS.flatMap((kind): [string, OperationKind][] => [
    [kind, kind],
    [GADGET_CATALOG[kind].legacyName, kind],
  ])
);

export function isOperationKind(name: unknown): name is OperationKind {
  return OPERATION_KINDS.some((kind) => kind === name);
}

export function isKnownKindName(name: string): boolean {
  return KIND_BY_NAME.has(name);
}

/** Maps a canonical or legacy operation name to its kind. */
export function resolveKind(name: string): OperationKind {
  const kind = KIND_BY_NAME.get(name);
  if (kind === undefined) {
    throw new UnresolvableKindError(name);
  }
  return kind;
}

export function describeArity(kind: OperationKind): string {
  const { roles } = GADGET_CATALOG[kind];
  const noun = roles.length === 1 ? "operand" : "operands";
  return `${roles.length} ${noun} (${roles.join(", ")})`;
}
