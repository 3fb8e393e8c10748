import { Router } from "express";
import pkg from "../../package.json";

export default function HealthRoutes(): Router {
  const r = Router();
  r.get("/health", (_req, res) =>
    res.json({ ok: true, version: pkg.version, uptimeSeconds: Math.floor(process.uptime()) })
  );
  return r;
}
