// src/registry/dispatcher.ts
import { randomUUID } from "crypto";
import type { SafeParseReturnType, ZodIssue } from "zod";
import { resolveCredential } from "../config/env";
import type { EnvelopeError, ErrorKind, ResultEnvelope, ToolDefinition } from "../types/mcp";
import { errorMessage, isRegistryError, isUpstreamError, UpstreamError } from "../utils/errors";
import { logger } from "../utils/logger";
import type { ServiceRegistry } from "./serviceRegistry";

export type DispatcherOptions = {
  timeoutMs: number;
  resolveCredential?: (credentialRef: string) => string | undefined;
};

export type ExecuteOptions = {
  // resolve the tool inside this service only
  serviceId?: string;
  // aborted by the transport when the caller goes away
  signal?: AbortSignal;
};

// largest delay setTimeout accepts; anything above fires after 1 ms
export const MAX_TIMEOUT_MS = 2_147_483_647;

export const INTERNAL_ERROR_MESSAGE = "Internal error while executing tool";

const statusByKind: Record<ErrorKind, number> = {
  ValidationError: 400,
  ToolNotFound: 404,
  ServiceNotFound: 404,
  UpstreamError: 502,
  InternalError: 500,
};

export function statusForError(kind: ErrorKind): number {
  return statusByKind[kind];
}

export function statusForEnvelope(envelope: ResultEnvelope): number {
  return envelope.success ? 200 : statusForError(envelope.error.kind);
}

export function failure(error: EnvelopeError): ResultEnvelope {
  return { success: false, error };
}

export function internalFailure(referenceId: string): ResultEnvelope {
  return failure({ kind: "InternalError", message: INTERNAL_ERROR_MESSAGE, referenceId });
}

export function describeIssues(issues: ZodIssue[]): { message: string; issues: { path: string; message: string }[] } {
  const flat = issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
  return {
    message: flat.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join("; "),
    issues: flat,
  };
}

class HandlerTimeout extends Error {}

/**
 * Resolves a tool, validates its params, runs the handler and folds whatever
 * happens into a ResultEnvelope. `execute` never rejects.
 */
export class Dispatcher {
  private readonly timeoutMs: number;
  private readonly resolveCredential: (credentialRef: string) => string | undefined;

  constructor(private readonly registry: ServiceRegistry, options: DispatcherOptions) {
    this.timeoutMs = Math.min(Math.max(options.timeoutMs, 1), MAX_TIMEOUT_MS);
    this.resolveCredential = options.resolveCredential ?? ((ref) => resolveCredential(ref));
  }

  async execute(toolName: string, params: unknown, options: ExecuteOptions = {}): Promise<ResultEnvelope> {
    const requestId = randomUUID();

    let tool: ToolDefinition;
    try {
      tool =
        options.serviceId === undefined
          ? this.registry.lookupTool(toolName)
          : this.registry.lookupServiceTool(options.serviceId, toolName);
    } catch (err) {
      if (isRegistryError(err) && (err.kind === "ToolNotFound" || err.kind === "ServiceNotFound")) {
        logger.info({ requestId, toolName }, err.message);
        return failure({ kind: err.kind, message: err.message });
      }
      return this.internal(err, requestId, toolName);
    }

    // refinements and transforms are user code and may throw
    let validation: SafeParseReturnType<unknown, unknown>;
    try {
      validation = tool.inputContract.safeParse(params ?? {});
    } catch (err) {
      return this.internal(err, requestId, tool.name);
    }
    if (!validation.success) {
      const { message, issues } = describeIssues(validation.error.issues);
      logger.info({ requestId, toolName: tool.name }, `Invalid params: ${message}`);
      return failure({
        kind: "ValidationError",
        message: `Invalid params for tool '${tool.name}': ${message}`,
        detail: { issues },
      });
    }
    const validParams: unknown = validation.data;

    logger.info(
      { requestId, tool: tool.name, service: tool.ownerServiceId },
      `Executing tool '${tool.name}'`
    );

    try {
      const data = await this.invoke(tool, validParams, requestId, options.signal);
      return { success: true, data: data === undefined ? null : data };
    } catch (err) {
      if (err instanceof HandlerTimeout) {
        logger.warn({ requestId, tool: tool.name }, err.message);
        return failure({
          kind: "UpstreamError",
          message: err.message,
          detail: { code: "timeout", service: tool.ownerServiceId },
        });
      }
      if (isUpstreamError(err)) {
        logger.warn(
          { requestId, tool: tool.name, status: err.status, code: err.code },
          `Upstream failure: ${err.message}`
        );
        return failure({
          kind: "UpstreamError",
          message: `Service '${tool.ownerServiceId}' failed: ${err.message}`,
          detail: {
            service: tool.ownerServiceId,
            status: err.status,
            code: err.code,
            detail: err.detail,
          },
        });
      }
      return this.internal(err, requestId, tool.name);
    }
  }

  private async invoke(
    tool: ToolDefinition,
    params: unknown,
    requestId: string,
    callerSignal: AbortSignal | undefined
  ): Promise<unknown> {
    const service = this.registry.getService(tool.ownerServiceId);
    const controller = new AbortController();
    const context = {
      signal: controller.signal,
      credential: this.resolveCredential(service.credentialRef),
      requestId,
    };
    const onCallerAbort = () => controller.abort(callerSignal?.reason);

    if (callerSignal?.aborted) {
      throw new UpstreamError("Request was cancelled before the tool ran", { code: "aborted" });
    }
    callerSignal?.addEventListener("abort", onCallerAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new HandlerTimeout(`Tool '${tool.name}' timed out after ${this.timeoutMs} ms`));
      }, this.timeoutMs);
    });
    const cancelled = new Promise<never>((_resolve, reject) => {
      controller.signal.addEventListener(
        "abort",
        () => {
          if (callerSignal?.aborted) {
            reject(new UpstreamError("Request was cancelled by the caller", { code: "aborted" }));
          }
        },
        { once: true }
      );
    });
    // the losing promises must not surface as unhandled rejections
    timeout.catch(() => undefined);
    cancelled.catch(() => undefined);

    // a handler that throws synchronously still ends up as a rejection
    const run = Promise.resolve().then(() => tool.handler(params, context));
    run.catch((err: unknown) => {
      if (controller.signal.aborted) {
        logger.debug({ requestId, tool: tool.name }, `Handler failed after abort: ${errorMessage(err)}`);
      }
    });

    try {
      return await Promise.race([run, timeout, cancelled]);
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener("abort", onCallerAbort);
    }
  }

  private internal(err: unknown, referenceId: string, toolName: string): ResultEnvelope {
    logger.error(
      { referenceId, toolName, err: err instanceof Error ? err.stack ?? err.message : err },
      "Tool execution failed with an internal error"
    );
    return internalFailure(referenceId);
  }
}
