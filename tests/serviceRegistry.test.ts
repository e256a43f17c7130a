import { describe, it, expect, beforeEach, vi } from "vitest";
import { z } from "zod";
import { defineService, ServiceRegistry } from "../src/registry/serviceRegistry";
import type { ServiceAdapter, ToolContext } from "../src/types/mcp";
import { RegistryError } from "../src/utils/errors";
import { makeService, makeTool, thrown } from "./helpers";

describe("ServiceRegistry", () => {
  let registry: ServiceRegistry;

  beforeEach(() => {
    registry = new ServiceRegistry();
  });

  it("returns the exact tool definition that was registered", () => {
    const service = makeService("github", { list_issues: {}, create_issue: {} });
    registry.registerService(service);

    expect(registry.lookupTool("list_issues")).toBe(service.tools[0]);
    expect(registry.lookupTool("create_issue")).toBe(service.tools[1]);
  });

  it("resolves qualified serviceId.toolName keys to the same tool", () => {
    registry.registerService(makeService("github", { list_issues: {} }));

    expect(registry.lookupTool("github.list_issues")).toBe(registry.lookupTool("list_issues"));
    expect(registry.lookupServiceTool("github", "list_issues")).toBe(registry.lookupTool("list_issues"));
  });

  it("throws ToolNotFound for unknown tools", () => {
    const err = thrown(() => registry.lookupTool("list_issues"));
    expect(err).toBeInstanceOf(RegistryError);
    expect(err).toMatchObject({ kind: "ToolNotFound", message: "Tool 'list_issues' not found" });
  });

  it("lists as many tools as the services declare", () => {
    registry.registerService(makeService("github", { list_repos: {}, list_issues: {}, get_user: {} }));
    registry.registerService(makeService("linear", { list_teams: {}, list_tickets: {} }));

    expect(registry.listTools()).toHaveLength(5);
    expect(registry.size).toEqual({ services: 2, tools: 5 });
  });

  it("lists tools in registration order tagged with their service", () => {
    registry.registerService(makeService("github", { list_issues: {} }));
    registry.registerService(makeService("linear", { list_tickets: {} }));

    expect(registry.listTools().map(({ name, serviceId, qualifiedName }) => ({ name, serviceId, qualifiedName }))).toEqual([
      { name: "list_issues", serviceId: "github", qualifiedName: "github.list_issues" },
      { name: "list_tickets", serviceId: "linear", qualifiedName: "linear.list_tickets" },
    ]);
  });

  it("filters tools by service and rejects unknown services", () => {
    registry.registerService(makeService("github", { list_issues: {} }));
    registry.registerService(makeService("linear", { list_tickets: {}, list_teams: {} }));

    expect(registry.listTools("linear").map((t) => t.name)).toEqual(["list_tickets", "list_teams"]);
    expect(thrown(() => registry.listTools("jira"))).toMatchObject({ kind: "ServiceNotFound" });
  });

  it("lists services in registration order", () => {
    registry.registerService(makeService("linear", { list_tickets: {} }));
    registry.registerService(makeService("github", { list_issues: {}, get_user: {} }));

    expect(registry.listServices()).toEqual([
      {
        id: "linear",
        displayName: "LINEAR",
        description: "linear test service",
        baseEndpoint: "https://linear.example.test",
        tools: ["list_tickets"],
      },
      {
        id: "github",
        displayName: "GITHUB",
        description: "github test service",
        baseEndpoint: "https://github.example.test",
        tools: ["list_issues", "get_user"],
      },
    ]);
  });

  it("renders the input contract as JSON Schema", () => {
    registry.registerService(
      makeService("github", {
        create_issue: {
          inputContract: z.object({ title: z.string(), labels: z.array(z.string()).optional() }),
        },
      })
    );

    const [tool] = registry.listTools();
    expect(tool.inputSchema).toMatchObject({
      type: "object",
      properties: { title: { type: "string" }, labels: { type: "array", items: { type: "string" } } },
      required: ["title"],
    });
    expect(tool.inputSchema).not.toHaveProperty("$schema");
  });

  it("freezes registered definitions", () => {
    const service = makeService("github", { list_issues: {} });
    registry.registerService(service);

    expect(Object.isFrozen(registry.getService("github"))).toBe(true);
    expect(Object.isFrozen(registry.lookupTool("list_issues"))).toBe(true);
  });

  describe("duplicate services", () => {
    it("rejects a second service with the same id and keeps the first intact", () => {
      const first = makeService("github", { list_issues: {} });
      registry.registerService(first);

      const err = thrown(() => registry.registerService(makeService("github", { create_issue: {} })));

      expect(err).toBeInstanceOf(RegistryError);
      expect(err).toMatchObject({ kind: "DuplicateService", message: "Service 'github' is already registered" });
      expect(registry.getService("github")).toBe(first);
      expect(registry.lookupTool("list_issues")).toBe(first.tools[0]);
      expect(thrown(() => registry.lookupTool("create_issue"))).toMatchObject({ kind: "ToolNotFound" });
      expect(registry.size).toEqual({ services: 1, tools: 1 });
    });
  });

  describe("tool name collisions", () => {
    it("rejects the whole colliding registration, the same way on every run", () => {
      for (let run = 0; run < 3; run++) {
        const local = new ServiceRegistry();
        local.registerService(makeService("serviceA", { sync: {} }));

        const err = thrown(() => local.registerService(makeService("serviceB", { other: {}, sync: {} })));

        expect(err).toMatchObject({
          kind: "DuplicateTool",
          message: "Tool 'sync' is already registered by service 'serviceA'",
        });
        expect(local.hasService("serviceB")).toBe(false);
        expect(local.lookupTool("sync").ownerServiceId).toBe("serviceA");
        expect(thrown(() => local.lookupTool("other"))).toMatchObject({ kind: "ToolNotFound" });
        expect(local.listTools().map((t) => t.name)).toEqual(["sync"]);
      }
    });

    it("rejects a service that declares the same tool twice", () => {
      const service = makeService("github", { list_issues: {} });
      const twice = { ...service, tools: [...service.tools, makeTool("github", "list_issues")] };

      expect(thrown(() => registry.registerService(twice))).toMatchObject({ kind: "DuplicateTool" });
      expect(registry.size).toEqual({ services: 0, tools: 0 });
    });
  });

  describe("invalid definitions", () => {
    it("rejects ids and names that would make qualified keys ambiguous", () => {
      expect(thrown(() => registry.registerService(makeService("git.hub")))).toMatchObject({
        kind: "InvalidDefinition",
      });
      expect(thrown(() => registry.registerService(makeService("github", { "issues.list": {} })))).toMatchObject({
        kind: "InvalidDefinition",
      });
    });

    it("rejects tools owned by another service", () => {
      const service = { ...makeService("github"), tools: [makeTool("linear", "list_tickets")] };

      expect(thrown(() => registry.registerService(service))).toMatchObject({
        kind: "InvalidDefinition",
        message: "Tool 'list_tickets' belongs to 'linear', not 'github'",
      });
      expect(registry.hasService("github")).toBe(false);
    });
  });

  describe("lookupServiceTool", () => {
    beforeEach(() => {
      registry.registerService(makeService("github", { list_issues: {} }));
      registry.registerService(makeService("linear", { list_tickets: {} }));
    });

    it("does not resolve another service's tool", () => {
      expect(thrown(() => registry.lookupServiceTool("linear", "list_issues"))).toMatchObject({
        kind: "ToolNotFound",
        message: "Tool 'list_issues' not found in service 'linear'",
      });
    });

    it("reports unknown services", () => {
      expect(thrown(() => registry.lookupServiceTool("jira", "list_issues"))).toMatchObject({
        kind: "ServiceNotFound",
        message: "Service 'jira' not found",
      });
    });
  });

  describe("unregisterService", () => {
    it("removes the service with all of its tools", () => {
      registry.registerService(makeService("github", { list_issues: {}, get_user: {} }));
      registry.registerService(makeService("linear", { list_tickets: {} }));

      registry.unregisterService("github");

      expect(registry.hasService("github")).toBe(false);
      expect(thrown(() => registry.lookupTool("list_issues"))).toMatchObject({ kind: "ToolNotFound" });
      expect(thrown(() => registry.lookupTool("github.get_user"))).toMatchObject({ kind: "ToolNotFound" });
      expect(registry.listTools().map((t) => t.name)).toEqual(["list_tickets"]);
    });

    it("frees the tool names for a later registration", () => {
      registry.registerService(makeService("serviceA", { sync: {} }));
      registry.unregisterService("serviceA");
      registry.registerService(makeService("serviceB", { sync: {} }));

      expect(registry.lookupTool("sync").ownerServiceId).toBe("serviceB");
    });

    it("throws ServiceNotFound for unknown ids", () => {
      expect(thrown(() => registry.unregisterService("jira"))).toMatchObject({ kind: "ServiceNotFound" });
    });
  });

  it("dispose clears everything", () => {
    registry.registerService(makeService("github", { list_issues: {} }));
    registry.dispose();

    expect(registry.size).toEqual({ services: 0, tools: 0 });
    expect(registry.listServices()).toEqual([]);
  });
});

describe("defineService", () => {
  it("binds every tool handler to adapter.handle under the tool's name", async () => {
    const handle = vi.fn(async (toolName: string, params: unknown) => ({ toolName, params }));
    const adapter: ServiceAdapter = {
      describe: () => ({
        id: "github",
        displayName: "GitHub",
        description: "GitHub",
        baseEndpoint: "https://api.github.test",
        credentialRef: "GITHUB_TOKEN",
      }),
      listTools: () => [{ name: "list_issues", description: "List issues", inputContract: z.object({}) }],
      handle,
    };

    const service = defineService(adapter);
    const context: ToolContext = {
      signal: new AbortController().signal,
      credential: undefined,
      requestId: "req-1",
    };

    expect(service.id).toBe("github");
    expect(service.tools[0].ownerServiceId).toBe("github");
    await expect(service.tools[0].handler({ state: "open" }, context)).resolves.toEqual({
      toolName: "list_issues",
      params: { state: "open" },
    });
    expect(handle).toHaveBeenCalledWith("list_issues", { state: "open" }, context);
  });

  it("registerAdapter registers the derived definition", () => {
    const registry = new ServiceRegistry();
    const service = registry.registerAdapter({
      describe: () => ({
        id: "linear",
        displayName: "Linear",
        description: "Linear",
        baseEndpoint: "https://api.linear.test/graphql",
        credentialRef: "LINEAR_API_KEY",
      }),
      listTools: () => [{ name: "list_teams", description: "List teams", inputContract: z.object({}) }],
      handle: async () => [],
    });

    expect(registry.getService("linear")).toBe(service);
    expect(registry.lookupTool("list_teams").ownerServiceId).toBe("linear");
  });
});
