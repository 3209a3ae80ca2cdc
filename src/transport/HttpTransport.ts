import type { RPCRequest, RequestOverrides } from "../clients/types/RPC.js";
import { ConfigurationError } from "../errors/ConfigurationError.js";
import {
  HttpError,
  RequestTimeoutError,
  TransportClosedError,
} from "../errors/TransportErrors.js";
import { type Logger, logger as defaultLogger } from "../logger.js";
import { DEFAULT_TIMEOUT, type FetchOptions } from "../utils/options.js";
import {
  type RPCResponseEnvelope,
  basicAuthorization,
  parseResponseEnvelope,
  requestHeadersWithDefaults,
} from "../utils/rpc.js";
import type { IHttpTransportConfig } from "./types/IHttpTransportConfig.js";
import type { ITransport } from "./types/ITransport.js";

const getGlobalFetch = (): typeof fetch => {
  if (typeof globalThis.fetch === "function") {
    return globalThis.fetch.bind(globalThis);
  }

  throw new ConfigurationError("No fetch implementation found");
};

const isTimeoutError = (error: unknown) =>
  typeof error === "object" && error !== null && "name" in error && error.name === "TimeoutError";

/**
 * HttpTransport posts JSON-RPC requests to the daemon with HTTP basic auth.
 *
 * The transport owns an abort controller for its whole lifetime. Every request is tied
 * to it, so {@link HttpTransport.close} aborts whatever is still in flight.
 *
 * @class HttpTransport
 * @typedef {HttpTransport}
 * @implements {ITransport}
 */
class HttpTransport implements ITransport {
  /**
   * The endpoint to which the transport connects.
   */
  public endpoint: string;

  /**
   * The timeout for the requests, in seconds.
   */
  public timeout: number;

  /**
   * The headers to be used in the requests, authorization included.
   */
  public headers: Record<string, string>;

  /**
   * The fetcher to be used in the requests.
   */
  public fetcher: typeof fetch;

  /**
   * Additional settings passed to every `fetch` call.
   */
  public fetchOptions: FetchOptions;

  private readonly lifetime = new AbortController();

  private readonly logger: Logger;

  constructor({
    endpoint,
    username,
    password,
    timeout = DEFAULT_TIMEOUT,
    headers,
    fetcher,
    fetchOptions = {},
    logger = defaultLogger,
  }: IHttpTransportConfig) {
    this.endpoint = endpoint;
    this.timeout = timeout;
    this.headers = requestHeadersWithDefaults(basicAuthorization(username, password), headers);
    this.fetcher = fetcher ?? getGlobalFetch();
    this.fetchOptions = fetchOptions;
    this.logger = logger;
  }

  /**
   * Whether {@link HttpTransport.close} has been called.
   */
  public get closed(): boolean {
    return this.lifetime.signal.aborted;
  }

  /**
   * Sends a request to the daemon.
   *
   * A reply with an error status is still decoded when its body is a JSON-RPC envelope,
   * since the daemon reports RPC failures with status 500 or 404.
   *
   * @public
   * @async
   * @param {RPCRequest} requestObject The request object.
   * @param {RequestOverrides} overrides Per-request timeout and abort signal.
   * @returns {Promise<RPCResponseEnvelope>} The decoded response envelope.
   */
  public async request(
    requestObject: RPCRequest,
    overrides: RequestOverrides = {},
  ): Promise<RPCResponseEnvelope> {
    if (this.closed) {
      throw new TransportClosedError();
    }

    const timeout = overrides.timeout ?? this.timeout;
    const deadline = AbortSignal.timeout(timeout * 1000);
    const signals = [this.lifetime.signal, deadline];
    if (overrides.signal) {
      signals.push(overrides.signal);
    }

    let response: Response;
    let text: string;
    try {
      response = await this.fetcher(this.endpoint, {
        ...this.fetchOptions,
        method: "POST",
        headers: this.headers,
        body: JSON.stringify(requestObject),
        signal: AbortSignal.any(signals),
      });
      text = await response.text();
    } catch (error) {
      // A caller signal may time out too; only the client deadline maps to RequestTimeoutError.
      if (deadline.aborted && isTimeoutError(error)) {
        throw new RequestTimeoutError(timeout, { cause: error });
      }

      throw error;
    }

    if (!response.ok) {
      try {
        return parseResponseEnvelope(JSON.parse(text));
      } catch (cause) {
        throw new HttpError(response.status, response.statusText, { cause });
      }
    }

    return parseResponseEnvelope(JSON.parse(text));
  }

  /**
   * Closes the transport. Calling it again has no effect.
   */
  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.lifetime.abort(new TransportClosedError());
    this.logger.debug({ endpoint: this.endpoint }, "HTTP transport closed");
  }
}

export { HttpTransport };
