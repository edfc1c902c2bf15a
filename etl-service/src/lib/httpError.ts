import { ZodError } from "zod";
import { SchemaMismatchError, TransformError } from "../errors.js";

export type NormalizedHttpError = {
  statusCode: number;
  body: Record<string, unknown>;
};

const STATUS_DEFAULT_CODES: Record<number, string> = {
  400: "bad_request",
  404: "not_found",
  409: "conflict",
  413: "payload_too_large",
  415: "unsupported_media_type",
  422: "unprocessable_entity",
  500: "unexpected_error"
};

export class HttpError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(statusCode: number, code: string, message?: string) {
    super(message ?? code);
    this.statusCode = statusCode;
    this.code = code;
    Object.setPrototypeOf(this, HttpError.prototype);
  }
}

export function httpError(statusCode: number, code: string, message?: string): HttpError {
  return new HttpError(statusCode, code, message);
}

function normalizeCode(code: string): string {
  return code.trim().replace(/[^A-Za-z0-9]+/g, "_").toLowerCase();
}

function statusCodeFrom(err: unknown, fallbackStatusCode: number): number {
  const statusCode = typeof err === "object" && err && "statusCode" in err
    ? Number(err.statusCode)
    : Number.NaN;
  return Number.isFinite(statusCode) && statusCode >= 100 ? statusCode : fallbackStatusCode;
}

function errorCodeFrom(err: unknown, statusCode: number): string {
  if (typeof err === "object" && err && "code" in err && typeof err.code === "string" && err.code.trim()) {
    return normalizeCode(err.code);
  }
  return STATUS_DEFAULT_CODES[statusCode] ?? (statusCode >= 500 ? "unexpected_error" : "bad_request");
}

export function toHttpError(err: unknown, fallbackStatusCode = 500): NormalizedHttpError {
  if (err instanceof ZodError) {
    return {
      statusCode: 400,
      body: { error: "invalid_request", message: "Validation failed", details: err.flatten() }
    };
  }
  if (err instanceof SchemaMismatchError) {
    return {
      statusCode: 422,
      body: { error: "schema_mismatch", message: err.message, missingColumns: err.missingColumns }
    };
  }
  if (err instanceof TransformError) {
    return { statusCode: 422, body: { error: normalizeCode(err.reason), message: err.message } };
  }

  const statusCode = statusCodeFrom(err, fallbackStatusCode);
  const error = errorCodeFrom(err, statusCode);
  const body: Record<string, unknown> = { error };
  // Internal failure messages stay in the logs.
  if (err instanceof Error && err.message && err.message !== error && statusCode < 500) {
    body.message = err.message;
  }
  return { statusCode, body };
}
