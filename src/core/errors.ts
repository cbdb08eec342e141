/** Malformed settings or config files. Fatal at startup. */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/** Non-2xx response or unexpected payload from an upstream HTTP service. */
export class UpstreamError extends Error {
  readonly service: string;
  readonly status: number | null;

  constructor(service: string, message: string, status: number | null = null, options?: { cause?: unknown }) {
    super(`${service}: ${message}`, options);
    this.name = 'UpstreamError';
    this.service = service;
    this.status = status;
  }
}
