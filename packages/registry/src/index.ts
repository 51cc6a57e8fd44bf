export {
  GADGET_CATALOG,
  OPERATION_KINDS,
  describeArity,
  isKnownKindName,
  isOperationKind,
  resolveKind,
} from "./catalog.js";
export type { GadgetDescriptor, OperationKind } from "./catalog.js";
export { GadgetError, MalformedRecordError, UnresolvableKindError } from "./errors.js";
export type { GadgetErrorCode, MalformedReason, MalformedRecordDetails } from "./errors.js";
export { identifier, isIdentifier, isOperand, isReservedWord, operand } from "./identifier.js";
export type { Identifier, Operand } from "./identifier.js";
export { namespace, quoteLabel } from "./label.js";
export {
  DocumentError,
  createOperationRecord,
  formatSchemaErrors,
  parseOperationRecord,
  validateOperationDocument,
} from "./record.js";
export type { OperationRecord, OperationRecordInput } from "./record.js";
export { RENDERERS, lookupRenderer, renderRecord } from "./registry.js";
export {
  renderAssertNotSmallOrder,
  renderExposeInput,
  renderFieldToBits,
  renderFixedBaseScalarMul,
  renderPointAdd,
  renderWitness,
} from "./templates.js";
export type { Renderer } from "./templates.js";
export { SymbolTable, joinFragments, renderOperations } from "./program.js";
export type { RenderOptions, RenderedFragment } from "./program.js";
export { operationDocumentSchema, operationRecordSchema } from "./schemas.js";
export type { OperationDocument, OperationRecordJson } from "./schemas.js";
