import type { NextFunction, Request, Response } from 'express';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Hosting rewrites forward `/api/<resource>/...` (and function URLs forward
 * `/<resource>/...`) to the resource's app. Strip that prefix so the app's
 * routes are declared relative to the resource root.
 */
export function stripPathPrefix(resourceName: string) {
  const prefix = new RegExp(`^(?:/api)?/${escapeRegExp(resourceName)}(?=/|\\?|$)`);

  return (req: Request, _res: Response, next: NextFunction): void => {
    const stripped = req.url.replace(prefix, '');
    req.url = stripped.startsWith('/') ? stripped : `/${stripped}`;
    next();
  };
}
