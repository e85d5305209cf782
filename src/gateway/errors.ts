import { truncate } from '../utils/deadline';

const MAX_BODY_CHARS = 500;

/**
 * Provider settings are incomplete. Raised before any network I/O.
 */
export class ModelConfigError extends Error {
  constructor(readonly field: string, message: string) {
    super(message);
    this.name = 'ModelConfigError';
  }
}

/**
 * The provider answered with a non-success status.
 */
export class ModelHttpError extends Error {
  readonly body: string;

  constructor(readonly status: number, body: string) {
    const snippet = truncate(body, MAX_BODY_CHARS);
    super(`Model API returned status ${status}: ${snippet}`);
    this.name = 'ModelHttpError';
    this.body = snippet;
  }
}

/**
 * The provider answered 2xx but the body could not be used.
 */
export class ModelResponseError extends Error {
  constructor(message: string, readonly rawBody?: string) {
    super(rawBody === undefined ? message : `${message}, body: ${truncate(rawBody, MAX_BODY_CHARS)}`);
    this.name = 'ModelResponseError';
  }
}

export const NO_RESPONSE_MESSAGE = 'no response from model';
