import { Router, type Request, type Response } from "express";
import { resolveOptimizeOptions } from "@pngslim/config";
import { createLogger } from "@pngslim/log";
import { OPTIMIZE_JOB_OPTS, optimizeQueue } from "@pngslim/pipeline";
import { parseOptimizeJob } from "@pngslim/schemas";
import { route } from "./handler.js";

const log = createLogger("@api/jobs");

export const jobs: Router = Router();

// Enqueue a batch optimisation over paths the workers can see
jobs.post(
  "/jobs/optimize",
  route(async (req: Request, res: Response) => {
    const data = parseOptimizeJob(req.body);
    // bad options fail here rather than in the worker
    await resolveOptimizeOptions(data.options ?? {});
    const job = await optimizeQueue().add("optimize", data, OPTIMIZE_JOB_OPTS);
    log.info({ jobId: job.id, input: data.input }, "job.enqueued");
    res.status(202).json({ ok: true, jobId: job.id });
  })
);

jobs.get(
  "/jobs/:id",
  route(async (req: Request, res: Response) => {
    res.set("Cache-Control", "no-store, no-cache, must-revalidate");
    res.set("Pragma", "no-cache");
    res.set("Expires", "0");

    const job = await optimizeQueue().getJob(req.params.id);
    if (!job) {
      res.status(404).json({ ok: false, code: "NOT_FOUND", message: `no job ${req.params.id}` });
      return;
    }

    const state = await job.getState();
    res.json({
      ok: true,
      id: job.id,
      name: job.name,
      state,                       // waiting|active|completed|failed|delayed
      progress: job.progress ?? 0,
      returnvalue: job.returnvalue ?? null,
      attemptsMade: job.attemptsMade ?? 0,
      attempts: job.opts?.attempts ?? 1,
      failedReason: job.failedReason ?? null,
      finishedOn: job.finishedOn ?? null,
      processedOn: job.processedOn ?? null,
    });
  })
);
