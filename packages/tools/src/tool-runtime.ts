import { v4 as uuid } from "uuid";
import type {
  ToolManifest,
  ToolExecutionRequest,
  ToolExecutionResult,
  ToolErrorCode,
  ToolHandler,
  ExecutionMode,
} from "@lantern/schemas";
import {
  validateToolInput,
  validateToolOutput,
  withTimeout,
  EngineTransitionError,
  TimeoutError,
  errorMessage,
} from "@lantern/schemas";
import { ToolRegistry } from "./tool-registry.js";

export type { ToolHandler } from "@lantern/schemas";

export function createRequest(
  toolName: string,
  input: Record<string, unknown> = {},
  mode: ExecutionMode = "live",
  requestId: string = uuid(),
): ToolExecutionRequest {
  return { request_id: requestId, tool_name: toolName, input, mode };
}

/**
 * Validates and dispatches tool requests. A timeout reports an error to the
 * caller but does not cancel the handler: the session's queue still finishes
 * the engine call before the next request runs.
 */
export class ToolRuntime {
  private registry: ToolRegistry;
  private handlers = new Map<string, ToolHandler>();

  constructor(registry: ToolRegistry) {
    this.registry = registry;
  }

  registerHandler(toolName: string, handler: ToolHandler): void {
    if (this.handlers.has(toolName)) {
      throw new Error(`Handler already registered for tool "${toolName}". Unregister first.`);
    }
    this.handlers.set(toolName, handler);
  }

  registerHandlers(handlers: Record<string, ToolHandler>): void {
    for (const [name, handler] of Object.entries(handlers)) this.registerHandler(name, handler);
  }

  unregisterHandler(toolName: string): void {
    this.handlers.delete(toolName);
  }

  async execute(request: ToolExecutionRequest): Promise<ToolExecutionResult> {
    const startTime = Date.now();
    const manifest = this.registry.get(request.tool_name);
    if (!manifest) {
      return this.fail(request, startTime, "TOOL_NOT_FOUND", `Tool "${request.tool_name}" not registered`);
    }

    const inputValidation = validateToolInput(request.input, manifest.input_schema);
    if (!inputValidation.valid) {
      return this.fail(request, startTime, "INVALID_INPUT", `Input validation failed: ${inputValidation.errors.join(", ")}`);
    }

    let output: unknown;
    try {
      output = await this.executeWithTimeout(request, manifest);
    } catch (err) {
      const message = errorMessage(err);
      if (err instanceof EngineTransitionError) return this.fail(request, startTime, "SESSION_FATAL", message);
      if (err instanceof TimeoutError) return this.fail(request, startTime, "TIMEOUT", message);
      return this.fail(request, startTime, "EXECUTION_ERROR", message);
    }

    const outputValidation = validateToolOutput(output, manifest.output_schema);
    if (!outputValidation.valid) {
      return this.fail(request, startTime, "INVALID_OUTPUT", `Output validation failed: ${outputValidation.errors.join(", ")}`);
    }

    return {
      request_id: request.request_id,
      ok: true,
      result: output,
      duration_ms: Date.now() - startTime,
      mode: request.mode,
    };
  }

  private async executeWithTimeout(request: ToolExecutionRequest, manifest: ToolManifest): Promise<unknown> {
    if (request.mode === "mock") return this.executeMock(manifest);
    const handler = this.handlers.get(request.tool_name);
    if (!handler) throw new Error(`No handler registered for tool "${request.tool_name}"`);
    return withTimeout(handler(request.input), manifest.timeout_ms, `Tool "${request.tool_name}"`);
  }

  private executeMock(manifest: ToolManifest): unknown {
    if (manifest.mock_responses && manifest.mock_responses.length > 0) return manifest.mock_responses[0];
    return {};
  }

  private fail(request: ToolExecutionRequest, startTime: number, code: ToolErrorCode, message: string): ToolExecutionResult {
    if (code === "SESSION_FATAL" || code === "EXECUTION_ERROR" || code === "TIMEOUT") {
      console.warn(`[tools] ${request.tool_name} failed (${code}): ${message}`);
    }
    return {
      request_id: request.request_id,
      ok: false,
      error: { code, message },
      duration_ms: Date.now() - startTime,
      mode: request.mode,
    };
  }
}
