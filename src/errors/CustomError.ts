import { validationErrorType } from 'App/types/errorType';

export class CustomError extends Error {
  public code: string;
  public statusCode: number;
  public details?: validationErrorType[];

  constructor(
    message: string,
    code: string,
    statusCode: number,
    details?: validationErrorType[],
  ) {
    super(message);
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype); // Restore prototype chain
  }
}

export class NotFoundError extends CustomError {
  constructor(message: string = 'Resource not found') {
    super(message, 'NOT_FOUND', 404);
  }
}

export class ValidationError extends CustomError {
  constructor(
    message: string = 'Validation error',
    details?: validationErrorType[],
  ) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

export class BadRequestError extends CustomError {
  constructor(message: string = 'Bad request') {
    super(message, 'BAD_REQUEST', 400);
  }
}

export class ServiceUnavailableError extends CustomError {
  constructor(message: string = 'Service unavailable') {
    super(message, 'SERVICE_UNAVAILABLE', 503);
  }
}
