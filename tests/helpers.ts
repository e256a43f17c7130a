import { z } from "zod";
import type { ServiceDefinition, ToolDefinition, ToolHandler } from "../src/types/mcp";

export type ToolStub = {
  handler?: ToolHandler;
  inputContract?: z.ZodTypeAny;
  description?: string;
};

export function makeTool(serviceId: string, name: string, stub: ToolStub = {}): ToolDefinition {
  return {
    name,
    description: stub.description ?? `${name} from ${serviceId}`,
    inputContract: stub.inputContract ?? z.object({}).passthrough(),
    ownerServiceId: serviceId,
    handler: stub.handler ?? (async () => null),
  };
}

export function makeService(id: string, tools: Record<string, ToolStub> = {}): ServiceDefinition {
  return {
    id,
    displayName: id.toUpperCase(),
    description: `${id} test service`,
    baseEndpoint: `https://${id}.example.test`,
    credentialRef: `${id.toUpperCase()}_TOKEN`,
    tools: Object.entries(tools).map(([name, stub]) => makeTool(id, name, stub)),
  };
}

export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected the call to throw");
}
