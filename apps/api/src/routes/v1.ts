import express, { type Response } from "express";
import type { BodyFatSession } from "@bodyfat/engine";
import {
  calculateBodyFat,
  getMeasurements,
  resetMeasurements,
  updateMeasurement,
  type HandlerResult,
} from "../lib/body-fat-handlers.js";

function send<T>(res: Response, result: HandlerResult<T>): void {
  if (result.status === 204) {
    res.status(204).end();
    return;
  }
  res.status(result.status).json(result.body);
}

export function createV1Router(session: BodyFatSession): express.Router {
  const router = express.Router();

  router.get("/health", (_req, res) => {
    res.json({ ok: true, service: "bodyfat-api", version: "v1" });
  });

  router.get("/measurements", (_req, res) => {
    send(res, getMeasurements(session));
  });

  router.put("/measurements/:site", (req, res) => {
    send(res, updateMeasurement(session, req.params.site, req.body));
  });

  router.delete("/measurements", (_req, res) => {
    send(res, resetMeasurements(session));
  });

  router.post("/body-fat/calculate", (req, res) => {
    send(res, calculateBodyFat(session, req.body));
  });

  return router;
}
