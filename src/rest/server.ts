import express, { type Request, type Response, type NextFunction } from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import { timingSafeEqual } from "node:crypto";
import type { Server } from "node:http";
import { createEvaluationRouter, type RouteDeps } from "./routes.js";
import { config } from "../config.js";
import { requestLogger, logRest } from "../logging.js";
import type { ResourceBudget } from "../eval/dispatch/budget.js";

export interface AppDeps extends RouteDeps {
  budget: ResourceBudget;
  /** Empty disables auth */
  apiKey?: string;
  /** Evaluations per minute per key */
  evalRateLimit?: number;
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function providedKey(req: Request): string | undefined {
  return headerValue(req.headers["x-api-key"]) ?? req.headers.authorization?.replace(/^Bearer\s+/i, "");
}

export function apiKeyAuth(key: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!key) {
      next();
      return;
    }
    const providedBuffer = Buffer.from(providedKey(req) ?? "");
    const keyBuffer = Buffer.from(key);

    if (providedBuffer.length === keyBuffer.length && timingSafeEqual(providedBuffer, keyBuffer)) {
      next();
    } else {
      res.status(401).json({ error: "Unauthorized: invalid or missing API key" });
    }
  };
}

// Keyed by API key so every caller behind one proxy doesn't share a bucket
const keyGenerator = (req: Request): string => providedKey(req) ?? "anonymous";

const startTime = Date.now();

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  const limit = deps.evalRateLimit ?? 30;

  const evalLimiter = rateLimit({
    windowMs: 60_000,
    limit,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator,
    message: { error: `Evaluation rate limit exceeded — ${limit} requests/minute` },
    validate: { ip: false },
  });

  app.use(cors());
  app.use(express.json({ limit: "1mb" }));
  app.use(requestLogger);

  // Health check (unauthenticated)
  app.get("/health", (_req, res) => {
    res.json({
      ok: true,
      uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
      concurrency: deps.budget.concurrency,
      tier: deps.budget.tier,
      timestamp: new Date().toISOString(),
    });
  });

  app.use("/api", apiKeyAuth(deps.apiKey ?? config.rest.apiKey), evalLimiter, createEvaluationRouter(deps));

  return app;
}

export function startRestServer(deps: AppDeps): Promise<Server> {
  return new Promise((resolve) => {
    const app = createApp(deps);

    const httpServer = app.listen(config.rest.port, () => {
      logRest.info({ port: config.rest.port }, "REST server listening");
      if (deps.apiKey ?? config.rest.apiKey) {
        logRest.info("API key authentication enabled");
      } else {
        logRest.warn("No REST_API_KEY set — endpoints are unauthenticated");
      }
      resolve(httpServer);
    });
  });
}
