/** Body of `POST /api/tools/:name`. The tool's own input schema checks `input`. */
export const ToolCallBodySchema = {
  type: "object",
  properties: {
    request_id: { type: "string", format: "uuid" },
    input: { type: "object" },
    mode: { type: "string", enum: ["live", "mock"] },
  },
  additionalProperties: false,
} as const;
