import type { NextFunction, Request, Response } from 'express';
import { RegistryError, type Logger } from '@depman/core';

/**
 * Turns registry failures raised inside a route into a 500 envelope carrying the
 * registry error code; anything else goes on to the next error handler. Needs
 * `responseEnvelope` mounted earlier.
 */
export function registryErrorHandler(logger?: Logger) {
  return (err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (!(err instanceof RegistryError)) return next(err);
    logger?.error(`${req.method} ${req.path}: ${err.message}`);
    res.fail({ code: 500, message: err.message, errors: { root: err.code } });
  };
}
