// src/lib/http/respond.ts
// Uniform JSON envelopes: { ok: true, data } | { ok: false, error, code, details }

import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { z, ZodError, ZodTypeAny } from "zod";
import type { DomainError } from "@/lib/errors/domain-error";
import { err, ok, type Result } from "@/lib/errors/result";
import { PayloadValidationError } from "@/modules/reports/report.errors";
import { formatIssuePath } from "@/modules/versions/structuredPayload.schema";

export function respondOk<T>(res: Response, data: T, status = 200) {
  return res.status(status).json({ ok: true, data });
}

export function respondError(res: Response, error: DomainError) {
  const { message, code, details } = error.toJSON();
  return res.status(error.status).json({ ok: false, error: message, code, details });
}

export function respondResult<T>(
  res: Response,
  result: Result<T, DomainError>,
  status = 200,
) {
  return result.ok
    ? respondOk(res, result.value, status)
    : respondError(res, result.error);
}

export function validationErrorFromZod(error: ZodError): PayloadValidationError {
  return new PayloadValidationError(
    error.issues.map((issue) => ({
      path: formatIssuePath(issue.path),
      message: issue.message,
    })),
  );
}

export function parseWith<S extends ZodTypeAny>(
  schema: S,
  value: unknown,
): Result<z.output<S>, PayloadValidationError> {
  const parsed = schema.safeParse(value);
  return parsed.success
    ? ok(parsed.data)
    : err(validationErrorFromZod(parsed.error));
}

/** Routes async controller failures to the global error handler. */
export function handle(
  fn: (req: Request, res: Response) => Promise<unknown>,
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}
