export class GserpError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'GserpError';
  }
}

export class ConfigError extends GserpError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export class InvalidRequestError extends GserpError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'InvalidRequestError';
  }
}

export class FetchError extends GserpError {
  public readonly url: string;
  public readonly statusCode?: number;

  constructor(
    url: string,
    message: string,
    statusCode?: number,
    options?: ErrorOptions
  ) {
    super(`[${url}] ${message}`, options);
    this.name = 'FetchError';
    this.url = url;
    this.statusCode = statusCode;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class OutputError extends GserpError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'OutputError';
  }
}
