import { NextFunction, RequestHandler, Response } from 'express';
import { TypedRequest } from '../types/typedRequest';

// Forwards rejected handlers to the error middleware.
export const asyncHandler =
  <Params = {}, Query = {}, Body = {}>(
    fn: (req: TypedRequest<Params, Query, Body>, res: Response, next: NextFunction) => Promise<unknown>,
  ): RequestHandler<Params, unknown, Body, Query> =>
  (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
