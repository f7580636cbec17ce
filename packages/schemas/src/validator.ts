import Ajv, { type ErrorObject, type ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import { ToolManifestSchema } from "./tool-manifest.schema.js";
import { ToolCallBodySchema } from "./tool-call.schema.js";
import { WorldSchema } from "./world.schema.js";
import type { ToolCallBody, ToolManifest, WorldDefinition } from "./types.js";

const ajv = new (Ajv.default ?? Ajv)({ allErrors: true, strict: false });
// ajv-formats has a nested .default in ESM due to CJS interop.
type FormatsFn = (instance: unknown) => void;
const applyFormats: FormatsFn = (addFormats as unknown as { default?: FormatsFn }).default ?? (addFormats as unknown as FormatsFn);
applyFormats(ajv);

const MAX_SCHEMA_CACHE = 100;
const schemaCache = new Map<string, ValidateFunction>();

function getOrCompile(schema: Record<string, unknown>): ValidateFunction {
  const key = JSON.stringify(schema);
  let validate = schemaCache.get(key);
  if (!validate) {
    if (schemaCache.size >= MAX_SCHEMA_CACHE) {
      const oldest = schemaCache.keys().next().value;
      if (oldest !== undefined) schemaCache.delete(oldest);
    }
    validate = ajv.compile(schema);
    schemaCache.set(key, validate);
  }
  return validate;
}

export function clearSchemaCache(): void {
  schemaCache.clear();
}

const validateToolManifest = ajv.compile(ToolManifestSchema);
const validateToolCallBody = ajv.compile(ToolCallBodySchema);
const validateWorld = ajv.compile(WorldSchema);

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

function toResult(valid: boolean, errors: ErrorObject[] | null | undefined): ValidationResult {
  if (valid) return { valid: true, errors: [] };
  const msgs = (errors ?? []).map(
    (e: ErrorObject) => `${e.instancePath || "/"}: ${e.message ?? "unknown error"}`
  );
  return { valid: false, errors: msgs };
}

export function validateToolManifestData(data: unknown): ValidationResult {
  const valid = validateToolManifest(data);
  return toResult(valid, validateToolManifest.errors);
}

export function isToolManifest(data: unknown): data is ToolManifest {
  return validateToolManifest(data);
}

export function isToolCallBody(data: unknown): data is ToolCallBody {
  return validateToolCallBody(data);
}

export function validateWorldData(data: unknown): ValidationResult {
  const valid = validateWorld(data);
  return toResult(valid, validateWorld.errors);
}

export function isWorldDefinition(data: unknown): data is WorldDefinition {
  return validateWorld(data);
}

export function validateToolCallBodyData(data: unknown): ValidationResult {
  const valid = validateToolCallBody(data);
  return toResult(valid, validateToolCallBody.errors);
}

export function validateToolInput(
  input: unknown,
  inputSchema: Record<string, unknown>
): ValidationResult {
  const validate = getOrCompile(inputSchema);
  const valid = validate(input);
  return toResult(valid, validate.errors);
}

export function validateToolOutput(
  output: unknown,
  outputSchema: Record<string, unknown>
): ValidationResult {
  const validate = getOrCompile(outputSchema);
  const valid = validate(output);
  return toResult(valid, validate.errors);
}
