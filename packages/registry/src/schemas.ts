import type { JSONSchemaType } from "ajv";

export interface OperationRecordJson {
  label: string;
  kind: string;
  output?: string;
  operands: string[];
}

export interface OperationDocument {
  externals?: string[];
  operations: OperationRecordJson[];
}

export const operationRecordSchema: JSONSchemaType<OperationRecordJson> = {
  type: "object",
  additionalProperties: false,
  required: ["label", "kind", "operands"],
  properties: {
    label: { type: "string" },
    kind: { type: "string", minLength: 1 },
    output: { type: "string", nullable: true },
    operands: {
      type: "array",
      items: { type: "string" },
    },
  },
};

export const operationDocumentSchema: JSONSchemaType<OperationDocument> = {
  type: "object",
  additionalProperties: false,
  required: ["operations"],
  properties: {
    externals: {
      type: "array",
      items: { type: "string" },
      nullable: true,
    },
    operations: {
      type: "array",
      items: operationRecordSchema,
    },
  },
};
