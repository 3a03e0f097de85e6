import type { Request } from 'express';
import { z } from 'zod';
import { integerKeySchema } from '../../shared/schema.js';
import { parseRequest } from '../errors.js';

// Only plain decimal digits; Number() would also take "0x1", "1e0" or " 1"
const idParamSchema = z
  .string()
  .regex(/^-?\d+$/, 'Expected a decimal integer')
  .pipe(z.coerce.number().pipe(integerKeySchema));

export function parseIdParam(req: Request, name: string): number {
  return parseRequest(z.object({ [name]: idParamSchema }), req.params, 'path')[name];
}
