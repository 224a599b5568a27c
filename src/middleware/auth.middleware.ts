import { NextFunction, Response } from 'express';
import { TypedRequest } from '../types/typedRequest';
import { UnauthorizedError } from '../utils/ErrorResponse';
import { verifyAccessToken } from '../utils/generateToken';

type AuthConfig = Parameters<typeof verifyAccessToken>[1];

export const extractToken = (req: TypedRequest): string | undefined => {
  // Bearer header wins over the cookie
  const authHeader = req.headers.authorization;
  if (authHeader && authHeader.startsWith('Bearer ')) {
    return authHeader.split(' ')[1];
  }

  const cookie: unknown = req.cookies?.access_token;
  return typeof cookie === 'string' && cookie ? cookie : undefined;
};

export const protect =
  (config: AuthConfig) =>
  (req: TypedRequest, _: Response, next: NextFunction) => {
    const token = extractToken(req);
    if (!token) {
      return next(new UnauthorizedError('No token provided'));
    }

    try {
      req.admin = { id: verifyAccessToken(token, config) };
      next();
    } catch (err) {
      next(err);
    }
  };

export const requireAdmin = <P, Q, B>(req: TypedRequest<P, Q, B>): string => {
  if (!req.admin) {
    throw new UnauthorizedError('Not authorized, no admin attached');
  }
  return req.admin.id;
};
