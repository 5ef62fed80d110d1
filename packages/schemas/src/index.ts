// packages/schemas/src/index.ts

import AjvModule, { type ErrorObject, type SchemaObject, type ValidateFunction } from "ajv";
import { createRequire } from "node:module";
import {
  DITHERERS, OPTIMIZERS, UnknownOptionError, ValidationError, isDithererName, isOptimizerName,
  type DithererName, type OptimizerName, type SearchMode,
} from "@pngslim/palette";

const require = createRequire(import.meta.url);

// CommonJS default export: the class sits on `.default` under NodeNext
const Ajv = AjvModule.default;

const optimizeSchema: SchemaObject = require("./optimize-options.schema.json");
const jobSchema: SchemaObject = require("./optimize-job.schema.json");

// ---------------- Types ----------------
export type StripMode = "safe" | "all" | "none";
export type InterlaceMode = "off" | "on" | "keep";

export type OptimizeOptions = {
  level: number;                 // 0..6
  lossy: number;                 // max Delta-E; 0 = lossless only
  mode: SearchMode;
  lossyFraction?: number;        // coverage mode, 0..1
  optimizer: OptimizerName;
  ditherer: DithererName;        // final quantization pass
  strip: StripMode;
  alpha: boolean;
  interlace: InterlaceMode;
  fast: boolean;
  timeout?: number;              // seconds
  verify: boolean;
  preserve: boolean;
  recursive: boolean;
  verbose: boolean;
};

/** Batch job request: paths on the worker's filesystem plus raw options. */
export type OptimizeJobRequest = {
  input: string | string[];
  output?: string | string[];
  options?: Record<string, unknown>;
};

export type AjvSummary = { message?: string; instancePath?: string; keyword?: string }[];

// Raw shape before strategy names are checked
type OptimizeOptionsInput = Omit<OptimizeOptions, "optimizer" | "ditherer"> & { optimizer: string; ditherer: string };

// Ajv instances (shared): strict for JSON bodies, coercing for query/form strings
export const ajv = new Ajv({ allErrors: true, strict: false, useDefaults: true });
const coercingAjv = new Ajv({ allErrors: true, strict: false, useDefaults: true, coerceTypes: true });

export const validateOptimizeOptions: ValidateFunction<OptimizeOptionsInput> =
  ajv.compile<OptimizeOptionsInput>(optimizeSchema);
const validateCoerced: ValidateFunction<OptimizeOptionsInput> =
  coercingAjv.compile<OptimizeOptionsInput>(optimizeSchema);

export const validateOptimizeJob: ValidateFunction<OptimizeJobRequest> = ajv.compile<OptimizeJobRequest>(jobSchema);

export function summarizeErrors(errors: ErrorObject[] | null | undefined): AjvSummary {
  return (errors ?? []).map(({ message, instancePath, keyword }) => ({ message, instancePath, keyword }));
}

export const DEFAULT_OPTIONS: Readonly<OptimizeOptions> = Object.freeze(parseOptimizeOptions({}));

/**
 * Validates caller options and fills defaults. `coerce` accepts strings
 * for numbers and booleans (query strings, multipart fields).
 * Throws ValidationError, or UnknownOptionError for strategy names.
 */
export function parseOptimizeOptions(input: unknown, opts: { coerce?: boolean } = {}): OptimizeOptions {
  if (typeof input !== "object" || input === null || Array.isArray(input)) {
    throw new ValidationError("options must be an object", [{ message: "must be object", instancePath: "", keyword: "type" }]);
  }
  // Ajv writes defaults (and coerced values) into the object it checks
  const draft: Record<string, unknown> = { ...input };
  const validate = opts.coerce ? validateCoerced : validateOptimizeOptions;
  if (!validate(draft)) {
    const errors = summarizeErrors(validate.errors);
    const first = errors[0];
    throw new ValidationError(`invalid options: ${first?.instancePath || "/"} ${first?.message ?? ""}`.trim(), errors);
  }
  if (draft.mode === "coverage" && draft.lossyFraction === undefined) {
    throw new ValidationError("invalid options: coverage mode needs lossyFraction", [
      { message: "required when mode is coverage", instancePath: "/lossyFraction", keyword: "required" },
    ]);
  }

  return { ...draft, optimizer: optimizerName(draft.optimizer), ditherer: dithererName(draft.ditherer) };
}

function optimizerName(raw: string): OptimizerName {
  const key = raw.trim().toLowerCase();
  if (isOptimizerName(key)) return key;
  throw new UnknownOptionError("optimizer", raw, OPTIMIZERS);
}

function dithererName(raw: string): DithererName {
  const key = raw.trim().toLowerCase();
  if (isDithererName(key)) return key;
  throw new UnknownOptionError("ditherer", raw, DITHERERS);
}

/** Shape check of a job request; its options are parsed by the worker. */
export function parseOptimizeJob(input: unknown): OptimizeJobRequest {
  if (validateOptimizeJob(input)) return input;
  const errors = summarizeErrors(validateOptimizeJob.errors);
  const first = errors[0];
  throw new ValidationError(`invalid job: ${first?.instancePath || "/"} ${first?.message ?? ""}`.trim(), errors);
}
