import { Router, type Request, type Response } from "express";

export const health: Router = Router();

health.get("/healthz", (_req: Request, res: Response) => {
  res.json({ ok: true, ts: Date.now() });
});
