import type { z } from "zod";

export type ToolInput = Record<string, unknown>;

export type ToolContext = {
  signal: AbortSignal;
  // value of the env var named by the owning service's credentialRef
  credential: string | undefined;
  requestId: string;
};

export type ToolHandler = (params: unknown, context: ToolContext) => Promise<unknown>;

export type ToolDefinition = {
  readonly name: string;
  readonly description: string;
  readonly inputContract: z.ZodTypeAny;
  readonly ownerServiceId: string;
  readonly handler: ToolHandler;
};

export type ServiceDefinition = {
  readonly id: string;
  readonly displayName: string;
  readonly description: string;
  readonly baseEndpoint: string;
  readonly credentialRef: string;
  readonly tools: readonly ToolDefinition[];
};

export type ServiceDescriptor = Omit<ServiceDefinition, "tools">;

export type ToolSpec = {
  name: string;
  description: string;
  inputContract: z.ZodTypeAny;
};

/**
 * What every backend integration supplies: a description of itself, the tools it
 * contributes, and one entry point that runs any of those tools.
 */
export interface ServiceAdapter {
  describe(): ServiceDescriptor;
  listTools(): ToolSpec[];
  handle(toolName: string, params: unknown, context: ToolContext): Promise<unknown>;
}

export type ServiceSummary = {
  id: string;
  displayName: string;
  description: string;
  baseEndpoint: string;
  tools: string[];
};

export type ToolSummary = {
  name: string;
  qualifiedName: string;
  description: string;
  serviceId: string;
  inputSchema: Record<string, unknown>;
};

export type ErrorKind =
  | "ValidationError"
  | "ToolNotFound"
  | "ServiceNotFound"
  | "UpstreamError"
  | "InternalError";

export type EnvelopeError = {
  kind: ErrorKind;
  message: string;
  detail?: Record<string, unknown>;
  referenceId?: string;
};

export type ResultEnvelope =
  | { success: true; data: unknown }
  | { success: false; error: EnvelopeError };
