import { Router, type Request, type Response } from "express";
import multer from "multer";
import { resolveOptimizeOptions } from "@pngslim/config";
import { createLogger } from "@pngslim/log";
import { optimizeBuffer } from "@pngslim/optimize";
import { ValidationError } from "@pngslim/palette";
import { isRecord, route } from "./handler.js";

const log = createLogger("@api/optimize");

/** Synchronous single-image optimisation: PNG in, PNG out. */
export function optimizeRouter(uploadLimitBytes: number): Router {
  const router = Router();
  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: uploadLimitBytes, files: 1 } });

  router.post(
    "/optimize",
    upload.single("file"),
    route(async (req: Request, res: Response) => {
      if (!req.file) {
        throw new ValidationError('multipart field "file" is required', [
          { message: "is required", instancePath: "/file", keyword: "required" },
        ]);
      }
      // form fields win over query parameters
      const raw = { ...req.query, ...(isRecord(req.body) ? req.body : {}) };
      const opts = await resolveOptimizeOptions(raw);

      const input = req.file.buffer;
      const result = await optimizeBuffer(input, opts);
      log.info(
        { file: req.file.originalname, inputBytes: input.length, outputBytes: result.data.length, paletteSize: result.paletteSize },
        "optimize.done"
      );

      res.set("Content-Type", "image/png");
      res.set("X-Palette-Size", result.paletteSize === null ? "none" : String(result.paletteSize));
      res.set("X-Input-Bytes", String(input.length));
      res.set("X-Output-Bytes", String(result.data.length));
      res.send(result.data);
    })
  );

  return router;
}
