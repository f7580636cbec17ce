export const ToolManifestSchema = {
  type: "object",
  required: ["name", "version", "description", "input_schema", "output_schema", "timeout_ms", "supports"],
  properties: {
    name: { type: "string", pattern: "^[a-z][a-z0-9_-]*$", minLength: 1, maxLength: 64 },
    version: { type: "string", pattern: "^\\d+\\.\\d+\\.\\d+" },
    description: { type: "string", minLength: 1 },
    input_schema: { type: "object" },
    output_schema: { type: "object" },
    timeout_ms: { type: "number", minimum: 100, maximum: 600000 },
    supports: {
      type: "object",
      required: ["mock"],
      properties: {
        mock: { type: "boolean", const: true },
      },
      additionalProperties: false,
    },
    mock_responses: { type: "array", items: { type: "object" } },
  },
  additionalProperties: false,
} as const;
