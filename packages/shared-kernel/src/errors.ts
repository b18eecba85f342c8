export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id?: string) {
    super(404, 'NOT_FOUND', id ? `${resource} with id '${id}' not found` : `${resource} not found`);
  }
}

export class ValidationError extends AppError {
  constructor(details: unknown) {
    super(400, 'VALIDATION_ERROR', 'Validation failed', details);
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(service: string, reason?: string) {
    super(502, `${service}_UNAVAILABLE`, reason ? `Service '${service}' unavailable: ${reason}` : `Service '${service}' unavailable`);
  }
}

export class BadGatewayResponseError extends AppError {
  constructor(service: string, details: unknown) {
    super(502, `${service}_BAD_RESPONSE`, `Service '${service}' returned an unexpected payload`, details);
  }
}
