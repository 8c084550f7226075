export class InsightsError extends Error {
  public readonly code: string;
  public readonly statusCode: number;

  constructor(message: string, code: string, statusCode = 500, options?: ErrorOptions) {
    super(message, options);
    this.name = 'InsightsError';
    this.code = code;
    this.statusCode = statusCode;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends InsightsError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIGURATION_ERROR', 500, options);
    this.name = 'ConfigurationError';
  }
}

export class AuthenticationError extends InsightsError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'AUTHENTICATION_ERROR', 502, options);
    this.name = 'AuthenticationError';
  }
}

export class RemoteFetchError extends InsightsError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'REMOTE_FETCH_ERROR', 502, options);
    this.name = 'RemoteFetchError';
  }
}

export class DataUnavailableError extends InsightsError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'DATA_UNAVAILABLE', 503, options);
    this.name = 'DataUnavailableError';
  }
}

export class NoDataAvailableError extends InsightsError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'NO_DATA_AVAILABLE', 503, options);
    this.name = 'NoDataAvailableError';
  }
}

export class MetricUnavailableError extends InsightsError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'METRIC_UNAVAILABLE', 404, options);
    this.name = 'MetricUnavailableError';
  }
}

export class InvalidRequestError extends InsightsError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'INVALID_REQUEST', 400, options);
    this.name = 'InvalidRequestError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
