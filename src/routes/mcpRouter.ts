import { Router, type Response } from "express";
import { z } from "zod";
import { describeIssues, failure, statusForEnvelope, type Dispatcher } from "../registry/dispatcher";
import type { ServiceRegistry } from "../registry/serviceRegistry";
import type { ResultEnvelope } from "../types/mcp";

export type McpRouterDeps = {
  registry: ServiceRegistry;
  dispatcher: Dispatcher;
};

const executeBody = z.object({
  tool_name: z.string().min(1),
  params: z.record(z.unknown()).optional(),
  // field name used by older clients
  parameters: z.record(z.unknown()).optional(),
});

// aborts when the client hangs up before we answered
function abortOnClose(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller.signal;
}

function send(res: Response, envelope: ResultEnvelope) {
  res.status(statusForEnvelope(envelope)).json(envelope);
}

export function createMcpRouter({ registry, dispatcher }: McpRouterDeps): Router {
  const mcpRouter = Router();

  // GET /services
  mcpRouter.get("/services", (_req, res) => {
    res.json(registry.listServices());
  });

  // GET /tools?service=github
  mcpRouter.get("/tools", (req, res) => {
    const service = typeof req.query.service === "string" ? req.query.service : undefined;

    if (service !== undefined && !registry.hasService(service)) {
      send(res, failure({ kind: "ServiceNotFound", message: `Service '${service}' not found` }));
      return;
    }
    res.json(registry.listTools(service));
  });

  // POST /execute { tool_name, params }
  mcpRouter.post("/execute", async (req, res, next) => {
    try {
      const body = executeBody.safeParse(req.body);
      if (!body.success) {
        const { message, issues } = describeIssues(body.error.issues);
        send(
          res,
          failure({
            kind: "ValidationError",
            message: `Invalid execute request: ${message}`,
            detail: { issues },
          })
        );
        return;
      }

      const { tool_name, params, parameters } = body.data;
      const envelope = await dispatcher.execute(tool_name, params ?? parameters ?? {}, {
        signal: abortOnClose(res),
      });
      send(res, envelope);
    } catch (err) {
      next(err);
    }
  });

  // POST /github/list_issues { ...params }
  mcpRouter.post("/:serviceId/:toolName", async (req, res, next) => {
    try {
      const { serviceId, toolName } = req.params;
      const envelope = await dispatcher.execute(toolName, req.body ?? {}, {
        serviceId,
        signal: abortOnClose(res),
      });
      send(res, envelope);
    } catch (err) {
      next(err);
    }
  });

  return mcpRouter;
}
