import express, { NextFunction, Request, Response } from "express";
import cors from "cors";
import helmet from "helmet";

/* ─────────── structured logging ─────────── */
import { pinoHttp } from "pino-http";
import { v4 as uuid } from "uuid";
import logger from "./utils/logger.js";
/* ─────────────────────────────────────────── */

import type { Settings } from "./config/settings.js";
import type { Pipeline } from "./pipeline.js";
import appRouter from "./routes/index.js";
import { isPipelineError, type PipelineErrorCode } from "./utils/errors.js";

// -------- CORS allow-list ------------
function corsOptions(allowed: readonly string[]): cors.CorsOptions {
  const allowedExact = new Set(allowed);
  return {
    origin(origin, cb) {
      // no Origin header (curl / server-to-server) or no allow-list configured
      const ok = !origin || allowedExact.size === 0 || allowedExact.has(origin);
      cb(ok ? null : new Error("Not allowed by CORS"), ok);
    },
    methods: "GET,POST,DELETE,OPTIONS",
    allowedHeaders: "Content-Type,Authorization",
  };
}
/* -------------------------------------- */

const STATUS_BY_CODE: Partial<Record<PipelineErrorCode, number>> = {
  DOCUMENT_INGESTION_FAILED: 422,
  INVALID_CONFIGURATION: 400,
  TIMEOUT: 504,
};

/** body-parser errors carry their own status (400 bad JSON, 413 too large). */
const clientErrorStatus = (err: unknown): number | undefined => {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status >= 400 && err.status < 500 ? err.status : undefined;
  }
  return undefined;
};

export function createApp(pipeline: Pipeline, settings: Pick<Settings, "apiToken" | "corsOrigins">) {
  const app = express();

  /* middle-ware chain ------------------------------------------------------ */
  app.set("trust proxy", 1);
  app.use(helmet());
  app.use(
    pinoHttp({
      logger,
      genReqId: () => uuid(),
      serializers: { res: (res: Response) => ({ statusCode: res.statusCode }) },
      customLogLevel(_req, res, err) {
        if (err || res.statusCode >= 500) return "error";
        if (res.statusCode >= 400) return "warn";
        return "info";
      },
    })
  );

  app.use((req, res, next) => {
    if (req.id) res.setHeader("X-Request-ID", String(req.id));
    next();
  });

  app.use(cors(corsOptions(settings.corsOrigins)));
  app.use(express.json({ limit: "10mb" }));

  /* routes ----------------------------------------------------------------- */
  app.use("/api/v1", appRouter(pipeline, settings.apiToken));

  app.use((_req, res) => {
    res.status(404).json({ message: "Not Found" });
  });

  /* error handlers --------------------------------------------------------- */
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (err instanceof Error && err.message === "Not allowed by CORS") {
      req.log?.warn({ origin: req.headers.origin }, "CORS blocked request");
      return res.status(403).json({ message: "CORS Error: This origin is not allowed." });
    }
    const status = clientErrorStatus(err);
    if (status !== undefined) {
      return res.status(status).json({ message: err instanceof Error ? err.message : "Bad Request" });
    }
    return next(err);
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isPipelineError(err)) {
      const status = STATUS_BY_CODE[err.code];
      if (status !== undefined) {
        (req.log ?? logger).warn({ code: err.code }, err.message);
        return res.status(status).json({ message: err.message, code: err.code });
      }
    }

    const errorId = uuid();
    (req.log ?? logger).error({ err, errorId }, "Unhandled error");
    return res.status(500).json({ message: "Internal Server Error", errorId });
  });

  return app;
}
