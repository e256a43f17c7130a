import { randomUUID } from "crypto";
import express from "express";
import cors from "cors";
import { failure, internalFailure, statusForEnvelope } from "./registry/dispatcher";
import { createMcpRouter, type McpRouterDeps } from "./routes/mcpRouter";
import { logger } from "./utils/logger";

// body-parser tags its errors with a `type`
function bodyParserErrorType(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "type" in err && typeof err.type === "string") {
    return err.type;
  }
  return undefined;
}

export function createApp(deps: McpRouterDeps): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  app.get("/healthz", (_req, res) => res.json({ ok: true }));
  app.use("/", createMcpRouter(deps));

  app.use((_req: express.Request, res: express.Response) => {
    res.status(404).json({ error: "not_found" });
  });

  app.use(
    (err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
      const type = bodyParserErrorType(err);
      if (type === "entity.parse.failed" || type === "entity.too.large") {
        const envelope = failure({
          kind: "ValidationError",
          message: type === "entity.parse.failed" ? "Malformed JSON body" : "Request body too large",
        });
        res.status(statusForEnvelope(envelope)).json(envelope);
        return;
      }

      const referenceId = randomUUID();
      logger.error({ err, referenceId }, "Unhandled error");
      const envelope = internalFailure(referenceId);
      res.status(statusForEnvelope(envelope)).json(envelope);
    }
  );

  return app;
}
