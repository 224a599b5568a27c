import { Request } from 'express';
import { AdminIdentity } from './auth';

export interface TypedRequest<Params = {}, Query = {}, Body = {}> extends Request<Params, unknown, Body, Query> {
  /** Set by `protect` once the token has been checked. */
  admin?: AdminIdentity;
}
