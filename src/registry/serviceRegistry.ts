// src/registry/serviceRegistry.ts
import { zodToJsonSchema } from "zod-to-json-schema";
import type {
  ServiceAdapter,
  ServiceDefinition,
  ServiceSummary,
  ToolDefinition,
  ToolSummary,
} from "../types/mcp";
import { RegistryError } from "../utils/errors";
import { logger } from "../utils/logger";

const NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

export function qualifiedToolName(serviceId: string, toolName: string): string {
  return `${serviceId}.${toolName}`;
}

/**
 * Builds the definition of a service from its adapter. Every tool handler
 * delegates to `adapter.handle` under the tool's own name.
 */
export function defineService(adapter: ServiceAdapter): ServiceDefinition {
  const descriptor = adapter.describe();
  const tools: ToolDefinition[] = adapter.listTools().map((spec) => ({
    name: spec.name,
    description: spec.description,
    inputContract: spec.inputContract,
    ownerServiceId: descriptor.id,
    handler: (params, context) => adapter.handle(spec.name, params, context),
  }));

  return { ...descriptor, tools };
}

/**
 * Holds every registered service and the tools they contribute.
 *
 * Tools are reachable by their bare name and by `serviceId.toolName`. Bare names
 * are unique: a registration that would rebind one is rejected as a whole.
 * All mutations are synchronous, so readers never see half a registration.
 * Construct one per process and call `dispose()` at shutdown.
 */
export class ServiceRegistry {
  private readonly servicesById = new Map<string, ServiceDefinition>();
  private readonly toolsByQualifiedName = new Map<string, ToolDefinition>();
  private readonly toolsByName = new Map<string, ToolDefinition>();
  private readonly schemaCache = new WeakMap<ToolDefinition, Record<string, unknown>>();

  registerService(service: ServiceDefinition): void {
    this.assertRegistrable(service);

    for (const tool of service.tools) Object.freeze(tool);
    Object.freeze(service.tools);
    Object.freeze(service);

    this.servicesById.set(service.id, service);
    for (const tool of service.tools) {
      this.toolsByName.set(tool.name, tool);
      this.toolsByQualifiedName.set(qualifiedToolName(service.id, tool.name), tool);
    }

    logger.info(
      `Registered service ${service.id} with ${service.tools.length} tool(s): ${service.tools
        .map((t) => t.name)
        .join(", ")}`
    );
  }

  registerAdapter(adapter: ServiceAdapter): ServiceDefinition {
    const service = defineService(adapter);
    this.registerService(service);
    return service;
  }

  unregisterService(id: string): void {
    const service = this.getService(id);
    for (const tool of service.tools) {
      this.toolsByName.delete(tool.name);
      this.toolsByQualifiedName.delete(qualifiedToolName(id, tool.name));
    }
    this.servicesById.delete(id);
    logger.info(`Unregistered service ${id}`);
  }

  getService(id: string): ServiceDefinition {
    const service = this.servicesById.get(id);
    if (!service) {
      throw new RegistryError("ServiceNotFound", `Service '${id}' not found`);
    }
    return service;
  }

  hasService(id: string): boolean {
    return this.servicesById.has(id);
  }

  /** Resolves a bare tool name or a qualified `serviceId.toolName`. */
  lookupTool(name: string): ToolDefinition {
    const tool = this.toolsByName.get(name) ?? this.toolsByQualifiedName.get(name);
    if (!tool) {
      throw new RegistryError("ToolNotFound", `Tool '${name}' not found`);
    }
    return tool;
  }

  lookupServiceTool(serviceId: string, toolName: string): ToolDefinition {
    if (!this.servicesById.has(serviceId)) {
      throw new RegistryError("ServiceNotFound", `Service '${serviceId}' not found`);
    }
    const tool = this.toolsByQualifiedName.get(qualifiedToolName(serviceId, toolName));
    if (!tool) {
      throw new RegistryError(
        "ToolNotFound",
        `Tool '${toolName}' not found in service '${serviceId}'`
      );
    }
    return tool;
  }

  listServices(): ServiceSummary[] {
    return Array.from(this.servicesById.values()).map((service) => ({
      id: service.id,
      displayName: service.displayName,
      description: service.description,
      baseEndpoint: service.baseEndpoint,
      tools: service.tools.map((t) => t.name),
    }));
  }

  listTools(serviceId?: string): ToolSummary[] {
    const services =
      serviceId === undefined
        ? Array.from(this.servicesById.values())
        : [this.getService(serviceId)];

    return services.flatMap((service) =>
      service.tools.map((tool) => ({
        name: tool.name,
        qualifiedName: qualifiedToolName(service.id, tool.name),
        description: tool.description,
        serviceId: service.id,
        inputSchema: this.inputSchemaFor(tool),
      }))
    );
  }

  get size(): { services: number; tools: number } {
    return { services: this.servicesById.size, tools: this.toolsByName.size };
  }

  dispose(): void {
    this.servicesById.clear();
    this.toolsByName.clear();
    this.toolsByQualifiedName.clear();
  }

  // every check runs before the first write
  private assertRegistrable(service: ServiceDefinition): void {
    if (!NAME_PATTERN.test(service.id)) {
      throw new RegistryError(
        "InvalidDefinition",
        `Service id '${service.id}' must match ${NAME_PATTERN}`
      );
    }
    if (this.servicesById.has(service.id)) {
      throw new RegistryError(
        "DuplicateService",
        `Service '${service.id}' is already registered`
      );
    }

    const seen = new Set<string>();
    for (const tool of service.tools) {
      if (!NAME_PATTERN.test(tool.name)) {
        throw new RegistryError(
          "InvalidDefinition",
          `Tool name '${tool.name}' must match ${NAME_PATTERN}`
        );
      }
      if (tool.ownerServiceId !== service.id) {
        throw new RegistryError(
          "InvalidDefinition",
          `Tool '${tool.name}' belongs to '${tool.ownerServiceId}', not '${service.id}'`
        );
      }
      if (seen.has(tool.name)) {
        throw new RegistryError(
          "DuplicateTool",
          `Service '${service.id}' declares tool '${tool.name}' more than once`
        );
      }
      const existing = this.toolsByName.get(tool.name);
      if (existing) {
        throw new RegistryError(
          "DuplicateTool",
          `Tool '${tool.name}' is already registered by service '${existing.ownerServiceId}'`
        );
      }
      seen.add(tool.name);
    }
  }

  private inputSchemaFor(tool: ToolDefinition): Record<string, unknown> {
    const cached = this.schemaCache.get(tool);
    if (cached) return cached;

    const rendered = zodToJsonSchema(tool.inputContract, { $refStrategy: "none" });
    const schema = Object.fromEntries(
      Object.entries(rendered).filter(([key]) => key !== "$schema")
    );
    this.schemaCache.set(tool, schema);
    return schema;
  }
}
