import type { ZodType, ZodTypeDef } from 'zod';

interface RequestWithBody {
  body?: unknown;
}

/**
 * Parses `req.body` with `schema` and replaces it with the parsed value, so
 * defaults and transforms are visible to the route handler. A failing payload
 * throws the ZodError, which the error handler turns into a 400.
 */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>) {
  return (req: RequestWithBody, _res: unknown, next: () => void): void => {
    req.body = schema.parse(req.body);
    next();
  };
}
