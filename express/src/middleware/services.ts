import type { NextFunction, Request, Response } from 'express';
import type { AnyContract, Contract, Registry } from '@depman/core';

export type RequestServices = {
  get: <T>(contract: Contract<T>) => T;
  has: (contract: AnyContract) => boolean;
};

declare global {
  namespace Express {
    interface Request {
      services?: RequestServices;
    }
  }
}

// Lookups go straight to the registry; a request adds no lifetime of its own.
export function servicesMiddleware(registry: Registry) {
  const services: RequestServices = {
    get: <T>(contract: Contract<T>) => registry.resolve(contract),
    has: (contract: AnyContract) => registry.isRegistered(contract),
  };

  return (req: Request, _res: Response, next: NextFunction) => {
    req.services = services;
    next();
  };
}

export function requestServices(req: Request): RequestServices {
  if (!req.services) throw new Error('servicesMiddleware is not mounted');
  return req.services;
}
