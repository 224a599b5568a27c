import { NextFunction, Request, Response } from 'express';
import jwt from 'jsonwebtoken';
import mongoose from 'mongoose';
import ErrorResponse, {
  ConflictError,
  NotFoundError,
  UnauthorizedError,
  ValidationError,
} from '../utils/ErrorResponse';

// Maps anything thrown by a handler onto the ErrorResponse taxonomy.
export const normalizeError = (err: unknown): ErrorResponse => {
  if (err instanceof ErrorResponse) return err;

  //wrong mongoDb id error
  if (err instanceof mongoose.Error.CastError) {
    return new NotFoundError(`Resource not found. Invalid: ${err.path}`);
  }

  //Duplicate key error
  if (err instanceof mongoose.mongo.MongoServerError && err.code === 11000) {
    const keyValue: unknown = err.keyValue;
    const fields = keyValue && typeof keyValue === 'object' ? Object.keys(keyValue).join(', ') : 'value';
    return new ConflictError(`Duplicate ${fields} entered`);
  }

  //Jwt expire error
  if (err instanceof jwt.TokenExpiredError) {
    return new UnauthorizedError('Json web token is expired, try again');
  }

  //wrong jwt  error
  if (err instanceof jwt.JsonWebTokenError) {
    return new UnauthorizedError('Json web token is invalid, try again');
  }

  // body-parser rejects malformed JSON with a SyntaxError
  if (err instanceof SyntaxError) {
    return new ValidationError('Malformed JSON body');
  }

  console.error('Unhandled error:', err);
  return new ErrorResponse('Internal server error', 500);
};

export const ErrorMiddleware = (err: unknown, _req: Request, res: Response, _next: NextFunction) => {
  const error = normalizeError(err);

  res.status(error.statusCode).json({
    success: false,
    message: error.message,
  });
};
