import { BaseError } from "./BaseError.js";

/**
 * The daemon answered with an error status and a body that is not JSON,
 * e.g. `401 Unauthorized` for wrong credentials.
 */
class HttpError extends BaseError {
  readonly status: number;

  constructor(status: number, statusText: string, options?: ErrorOptions) {
    super(`HTTP error! status: ${status}${statusText ? ` ${statusText}` : ""}`, options);
    this.status = status;
  }
}

class RequestTimeoutError extends BaseError {
  /**
   * The timeout that expired, in seconds.
   */
  readonly timeout: number;

  constructor(timeout: number, options?: ErrorOptions) {
    super(`Request timed out after ${timeout}s`, options);
    this.timeout = timeout;
  }
}

class TransportClosedError extends BaseError {
  constructor() {
    super("The transport has been closed");
  }
}

/**
 * The body is valid JSON but not a JSON-RPC response envelope.
 */
class InvalidResponseError extends BaseError {
  readonly body: unknown;

  constructor(message: string, body: unknown) {
    super(message);
    this.body = body;
  }
}

export { HttpError, InvalidResponseError, RequestTimeoutError, TransportClosedError };
