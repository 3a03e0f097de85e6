import type { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { ZodError, type ZodType, type ZodTypeDef } from 'zod';

export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly detail: string,
  ) {
    super(detail);
    this.name = 'HttpError';
  }
}

export type EntityName = 'Instance' | 'Item' | 'Project' | 'Model data';

export class NotFoundError extends HttpError {
  constructor(entity: EntityName) {
    super(404, `${entity} not found`);
    this.name = 'NotFoundError';
  }
}

export type RequestLocation = 'body' | 'path' | 'file';

export interface ValidationIssue {
  loc: (string | number)[];
  msg: string;
  type: string;
}

export class RequestValidationError extends Error {
  readonly issues: ValidationIssue[];

  constructor(location: RequestLocation, issues: ValidationIssue[]) {
    super(`Invalid request ${location}`);
    this.name = 'RequestValidationError';
    this.issues = issues;
  }

  static fromZod(location: RequestLocation, error: ZodError): RequestValidationError {
    return new RequestValidationError(
      location,
      error.issues.map((issue) => ({
        loc: [location, ...issue.path],
        msg: issue.message,
        type: issue.code,
      })),
    );
  }
}

/**
 * Parse part of a request against a schema, throwing a 422-bound error
 * before anything touches storage.
 */
export function parseRequest<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  value: unknown,
  location: RequestLocation,
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw RequestValidationError.fromZod(location, result.error);
  }
  return result.data;
}

// body-parser tags its failures with a `type` string
function isBodyParserError(err: unknown): err is Error & { type: string; status: number } {
  return (
    err instanceof Error &&
    'type' in err &&
    typeof err.type === 'string' &&
    'status' in err &&
    typeof err.status === 'number'
  );
}

export function errorHandler(err: unknown, _req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) {
    return next(err);
  }

  if (err instanceof HttpError) {
    return res.status(err.status).json({ detail: err.detail });
  }

  if (err instanceof RequestValidationError) {
    return res.status(422).json({ detail: err.issues });
  }

  if (err instanceof ZodError) {
    return res.status(422).json({ detail: RequestValidationError.fromZod('body', err).issues });
  }

  if (err instanceof multer.MulterError) {
    const status = err.code === 'LIMIT_FILE_SIZE' ? 413 : 422;
    return res.status(status).json({
      detail: [{ loc: ['file', err.field ?? 'file'], msg: err.message, type: err.code }],
    });
  }

  if (isBodyParserError(err)) {
    if (err.type === 'entity.parse.failed') {
      return res.status(422).json({
        detail: [{ loc: ['body'], msg: 'Malformed JSON body', type: 'json_invalid' }],
      });
    }
    return res.status(err.status).json({ detail: err.message });
  }

  console.error('Server error:', err);
  return res.status(500).json({ detail: 'Internal Server Error' });
}
