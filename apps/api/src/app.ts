import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";
import { BodyFatSession } from "@bodyfat/engine";
import { ErrorCode, sendError } from "./lib/api-error.js";
import type { ApiConfig } from "./lib/config.js";
import { createV1Router } from "./routes/v1.js";

/**
 * body-parser (and http-errors in general) tag request problems with a 4xx
 * `status` or `statusCode`: oversized bodies, bad charsets, malformed JSON.
 */
function clientErrorStatus(error: unknown): number | null {
  if (typeof error !== "object" || error === null) return null;
  const status = "status" in error ? error.status : "statusCode" in error ? error.statusCode : undefined;
  if (typeof status !== "number" || status < 400 || status > 499) return null;
  return status;
}

export function createApp(config: ApiConfig, session: BodyFatSession = new BodyFatSession()): express.Express {
  const app = express();
  app.use(cors(config.corsOrigin ? { origin: config.corsOrigin } : undefined));
  app.use(express.json({ limit: "100kb" }));
  app.use("/v1", createV1Router(session));

  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    const clientStatus = clientErrorStatus(error);
    if (clientStatus !== null) {
      const message = error instanceof SyntaxError
        ? "Malformed JSON body"
        : error instanceof Error ? error.message : "Bad request";
      sendError(res, clientStatus, message, ErrorCode.BAD_REQUEST);
      return;
    }
    console.error("Unhandled API error", error);
    const message = error instanceof Error ? error.message : "Internal error";
    sendError(res, 500, message, ErrorCode.INTERNAL_ERROR);
  });

  return app;
}
