export type ErrorCode =
  | "VALIDATION_ERROR"
  | "UNKNOWN_OPTION"
  | "CODEC_ERROR"
  | "CLUSTERING_ERROR"
  | "COMPRESSION_ERROR";

export class PngslimError extends Error {
  readonly code: ErrorCode;
  readonly statusCode: number;
  readonly context: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    statusCode: number,
    message: string,
    opts: { cause?: unknown; context?: Record<string, unknown> } = {}
  ) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = opts.context ?? {};
  }
}

export class ValidationError extends PngslimError {
  readonly details: unknown[];

  constructor(message: string, details: unknown[] = []) {
    super("VALIDATION_ERROR", 400, message, { context: { details } });
    this.details = details;
  }
}

export class UnknownOptionError extends PngslimError {
  constructor(option: string, value: string, allowed: readonly string[]) {
    super("UNKNOWN_OPTION", 400, `unknown ${option} "${value}"; expected one of ${allowed.join(", ")}`, {
      context: { option, value, allowed },
    });
  }
}

export class CodecError extends PngslimError {
  constructor(operation: "decode" | "encode", cause: unknown, path?: string) {
    super("CODEC_ERROR", 422, `failed to ${operation}${path ? ` ${path}` : ""}: ${describe(cause)}`, {
      cause,
      context: { operation, path },
    });
  }
}

export class ClusteringError extends PngslimError {
  constructor(targetSize: number, cause: unknown) {
    super("CLUSTERING_ERROR", 500, `quantization to ${targetSize} colors failed: ${describe(cause)}`, {
      cause,
      context: { operation: "quantize", targetSize },
    });
  }
}

export class CompressionError extends PngslimError {
  constructor(cause: unknown, path?: string) {
    super("COMPRESSION_ERROR", 500, `failed to compress${path ? ` ${path}` : ""}: ${describe(cause)}`, {
      cause,
      context: { operation: "compress", path },
    });
  }
}

export function isPngslimError(e: unknown): e is PngslimError {
  return e instanceof PngslimError;
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
