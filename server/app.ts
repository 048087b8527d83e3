import express, { type Express, type Request, type Response, type NextFunction } from "express";
import helmet from "helmet";
import cors from "cors";
import pinoHttp from "pino-http";
import rateLimit from "express-rate-limit";
import { randomUUID } from "crypto";
import pinoInstance, { logger } from "./logger";
import { corsOrigins, type AppConfig } from "./config";
import type { IStorage } from "./storage";
import { registerRoutes } from "./routes";
import type { ApiErrorBody } from "@shared/contracts/errors";

function errorStatus(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    const status = "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
    if (typeof status === "number" && status >= 400 && status < 600) return status;
  }
  return 500;
}

/**
 * Builds the express application around an already-opened storage.
 * Binding a port is left to the caller.
 */
export function createApp(storage: IStorage, config: AppConfig): Express {
  const app = express();
  app.set("trust proxy", 1);

  app.use(
    helmet({
      contentSecurityPolicy: config.NODE_ENV === "production",
      crossOriginEmbedderPolicy: false,
    }),
  );

  app.use(
    cors({
      origin: corsOrigins(config),
      methods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization", "X-Request-ID"],
      maxAge: 86400,
    }),
  );

  app.use(express.json({ limit: "1mb" }));

  app.use(
    pinoHttp({
      logger: pinoInstance,
      genReqId: (req) => {
        const header = req.headers["x-request-id"];
        return typeof header === "string" && header ? header : randomUUID();
      },
      autoLogging: {
        ignore: (req) => req.url === "/health",
      },
      customLogLevel: (_req, res, err) => {
        if (res.statusCode >= 500 || err) return "error";
        if (res.statusCode >= 400) return "warn";
        return "info";
      },
      customSuccessMessage: (req, res) => `${req.method} ${req.url} ${res.statusCode}`,
      customErrorMessage: (req, res) => `${req.method} ${req.url} ${res.statusCode} FAILED`,
      serializers: {
        req: (req) => ({ method: req.method, url: req.url }),
        res: (res) => ({ statusCode: res.statusCode }),
      },
    }),
  );

  app.use(
    rateLimit({
      windowMs: 15 * 60 * 1000,
      limit: config.RATE_LIMIT_MAX,
      standardHeaders: true,
      legacyHeaders: false,
      message: { message: "Too many requests, please try again later" },
    }),
  );

  registerRoutes(app, storage);

  app.use((_req: Request, res: Response) => {
    const body: ApiErrorBody = { message: "Not found", code: "NOT_FOUND" };
    res.status(404).json(body);
  });

  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    const status = errorStatus(err);
    if (status >= 500) {
      logger.apiError(req.method, req.path, err);
    }

    if (res.headersSent) {
      return next(err);
    }

    const message = err instanceof Error && status < 500 ? err.message : "Internal server error";
    const body: ApiErrorBody = {
      message,
      code: status >= 500 ? "INTERNAL_ERROR" : status === 404 ? "NOT_FOUND" : "VALIDATION_ERROR",
    };
    return res.status(status).json(body);
  });

  return app;
}
