/**
 * Error types
 */

/**
 * Missing or invalid process configuration. Fatal at startup.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: { variable: string; message: string }[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * A DNS provider call failed: transport, unexpected status or undecodable body
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly body?: string
  ) {
    super(message);
    this.name = 'ProviderError';
  }

  static unexpectedStatus(operation: string, status: number, body: string): ProviderError {
    return new ProviderError(
      `unexpected status code ${status} while ${operation}: ${body}`,
      status,
      body
    );
  }
}

/**
 * The public IP lookup failed
 */
export class IPLookupError extends Error {
  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'IPLookupError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
