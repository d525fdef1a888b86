import { isAxiosError } from 'axios';

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Short reason for a failed HTTP attempt: status code when the server answered,
 * otherwise the client-side error code (ECONNREFUSED, ECONNABORTED, ...).
 */
export function describeTransportError(error: unknown): string {
  if (isAxiosError(error)) {
    if (error.response) {
      return `HTTP ${error.response.status}`;
    }
    if (error.code) {
      return `${error.code}: ${error.message}`;
    }
  }
  return getErrorMessage(error);
}

/**
 * Thrown when environment configuration or the query file is invalid.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: Record<string, string[] | undefined> = {}
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}
