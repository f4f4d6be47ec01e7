import type { NextFunction, Request, Response } from 'express';

export type FailPayload = {
  code: number;
  message: string;
  errors?: Record<string, unknown>;
};

declare global {
  namespace Express {
    interface Response {
      ok: (data: unknown, code?: number) => Response;
      fail: (payload: FailPayload) => Response;
    }
  }
}

export function responseEnvelope(_req: Request, res: Response, next: NextFunction) {
  res.ok = (data: unknown, code = 200) => res.status(code).json({ success: true, code, data });

  res.fail = (payload: FailPayload) =>
    res.status(payload.code).json({
      success: false,
      code: payload.code,
      errors: payload.errors ?? { root: payload.message },
      message: payload.message,
    });

  next();
}
