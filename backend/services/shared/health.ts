// backend/services/shared/health.ts
import express from "express";

export type ReadinessDetails = Record<string, unknown>;
export type ReadinessFn = () => Promise<ReadinessDetails> | ReadinessDetails;

type Options = {
  service: string;
  env?: string;
  readiness?: ReadinessFn;
};

/**
 * Exposes:
 *   GET /health         -> legacy/compat liveness
 *   GET /health/live    -> explicit liveness
 *   GET /health/ready   -> explicit readiness
 *   GET /healthz        -> k8s-style liveness
 *   GET /readyz         -> k8s-style readiness
 */
export function createHealthRouter(opts: Options) {
  const router = express.Router();

  const base = {
    service: opts.service,
    env: opts.env ?? process.env.NODE_ENV,
  };

  const liveness = (req: express.Request, res: express.Response) => {
    res.json({ ...base, ok: true, instance: req.requestId });
  };

  const readiness = async (req: express.Request, res: express.Response) => {
    try {
      const details = opts.readiness ? await opts.readiness() : {};
      res.json({ ...base, ok: true, instance: req.requestId, ...details });
    } catch (err) {
      res.status(503).json({
        ...base,
        ok: false,
        instance: req.requestId,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  };

  router.get("/health", liveness);
  router.get("/health/live", liveness);
  router.get("/health/ready", readiness);
  router.get("/healthz", liveness);
  router.get("/readyz", readiness);

  return router;
}
