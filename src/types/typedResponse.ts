import { Response } from 'express';

export interface ApiResponse<T> {
  success: boolean;
  message?: string;
  data?: T;
}

export interface TypedResponse<T> extends Response {
  json: (body: ApiResponse<T>) => this;
}
