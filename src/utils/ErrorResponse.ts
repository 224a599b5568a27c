class ErrorResponse extends Error {
  statusCode: number;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = 'ErrorResponse';
    this.statusCode = statusCode;
  }
}

export class ValidationError extends ErrorResponse {
  constructor(message: string) {
    super(message, 400);
    this.name = 'ValidationError';
  }
}

export class UnauthorizedError extends ErrorResponse {
  constructor(message = 'Unauthorized') {
    super(message, 401);
    this.name = 'UnauthorizedError';
  }
}

export class NotFoundError extends ErrorResponse {
  constructor(message: string) {
    super(message, 404);
    this.name = 'NotFoundError';
  }
}

// Only raised internally by the idle-session sweep; the admin sees it as a notice.
export class TimeoutError extends ErrorResponse {
  constructor(message: string) {
    super(message, 408);
    this.name = 'TimeoutError';
  }
}

export class ConflictError extends ErrorResponse {
  constructor(message: string) {
    super(message, 409);
    this.name = 'ConflictError';
  }
}

export default ErrorResponse;
