import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { ZodTypeAny } from 'zod';

/**
 * Replace `req.body` with the schema's parsed output (defaults applied,
 * strings trimmed), or answer 400 with the flattened zod errors.
 */
export function validate(schema: ZodTypeAny): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const parsed = schema.safeParse(req.body ?? {});
    if (parsed.success) {
      req.body = parsed.data;
      next();
      return;
    }
    res.status(400).json({ error: 'Validation failed', details: parsed.error.flatten() });
  };
}
