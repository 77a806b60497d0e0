import express from "express";
import type { Router } from "express";

export type HealthBody = {
  ok: true;
  service: "api";
  status: "healthy";
  activeBrews: number;
};

export function buildHealthHandler(countActiveBrews: () => number) {
  return function healthHandler(_req: unknown, res: { json: (body: HealthBody) => void }) {
    res.json({ ok: true, service: "api", status: "healthy", activeBrews: countActiveBrews() });
  };
}

export function createHealthRouter(countActiveBrews: () => number): Router {
  const router = express.Router();
  router.get("/", buildHealthHandler(countActiveBrews));
  return router;
}
