export type ErrorDetails = Record<string, string | number | boolean | null>;

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  // Extra fields merged into the JSON error body
  public readonly details: ErrorDetails;

  constructor(message: string, statusCode: number, isOperational = true, details: ErrorDetails = {}) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.details = { ...details };

    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }

  addDetails(details: ErrorDetails): this {
    Object.assign(this.details, details);
    return this;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 400, true, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, true);
  }
}

/** The IP geolocation service gave no usable coordinates. */
export class GeolocationUnavailableError extends AppError {
  constructor(message = 'Could not determine flood hazard for your location', details?: ErrorDetails) {
    super(message, 502, true, details);
  }
}

/** The hazard dataset could not be downloaded or parsed. */
export class DatasetUnavailableError extends AppError {
  public readonly originalError: unknown;

  constructor(message = 'Flood hazard dataset is unavailable', originalError?: unknown) {
    super(message, 503, true);
    this.originalError = originalError;
  }
}
