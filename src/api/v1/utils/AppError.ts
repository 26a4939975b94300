export class AppError extends Error {
  statusCode: number;
  isOperational: boolean;

  constructor(message: string = "Something went wrong", statusCode: number = 500) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.isOperational = true;

    Error.captureStackTrace(this, this.constructor);
  }
}

/** Structurally invalid client input; `field` names the offending path. */
export class ValidationError extends AppError {
  field: string;
  reason: string;

  constructor(field: string, reason: string) {
    super(`${field}: ${reason}`, 400);
    this.field = field;
    this.reason = reason;
  }
}

/** A uniqueness invariant would be violated (duplicate SKU). */
export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409);
  }
}

/** A referenced row is missing or another store-enforced constraint failed. */
export class ConstraintError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

export class UnexpectedError extends AppError {
  constructor(message: string = "Internal Server Error", options?: { cause?: unknown }) {
    super(message, 500);
    this.isOperational = false;
    if (options && "cause" in options) {
      this.cause = options.cause;
    }
  }
}
