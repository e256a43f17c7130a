// src/utils/errors.ts

export type RegistryErrorKind =
  | "DuplicateService"
  | "DuplicateTool"
  | "ServiceNotFound"
  | "ToolNotFound"
  | "InvalidDefinition";

/** Raised by the registry itself: registration conflicts and failed lookups. */
export class RegistryError extends Error {
  readonly kind: RegistryErrorKind;

  constructor(kind: RegistryErrorKind, message: string) {
    super(message);
    this.name = "RegistryError";
    this.kind = kind;
  }
}

export type UpstreamErrorOptions = {
  status?: number;
  code?: string;
  detail?: unknown;
  cause?: unknown;
};

/**
 * Thrown by adapters when the backend service rejected or failed a call.
 * Anything else a handler throws is treated as an internal failure.
 */
export class UpstreamError extends Error {
  readonly kind = "UpstreamError" as const;
  readonly status?: number;
  readonly code?: string;
  readonly detail?: unknown;

  constructor(message: string, options: UpstreamErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "UpstreamError";
    this.status = options.status;
    this.code = options.code;
    this.detail = options.detail;
  }
}

export function isRegistryError(err: unknown): err is RegistryError {
  return err instanceof RegistryError;
}

// also matches errors built by a second copy of this module (e.g. a linked adapter package)
export function isUpstreamError(err: unknown): err is UpstreamError {
  if (err instanceof UpstreamError) return true;
  return err instanceof Error && "kind" in err && err.kind === "UpstreamError";
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
