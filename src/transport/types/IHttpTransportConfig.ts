import type { Logger } from "../../logger.js";
import type { FetchOptions } from "../../utils/options.js";

/**
 * The interface representing the configuration of the HTTP transport.
 */
type IHttpTransportConfig = {
  /**
   * The daemon RPC endpoint.
   * @example 'http://127.0.0.1:9904'
   */
  endpoint: string;
  /**
   * The RPC user, sent with HTTP basic auth.
   */
  username: string;
  /**
   * The RPC password, sent with HTTP basic auth.
   */
  password: string;
  /**
   * The request timeout, in seconds.
   * If the request is not completed within the timeout, it will be rejected.
   * @example 12
   * @default 5
   */
  timeout?: number;
  /**
   * The fetch function to be used for making requests.
   * This is useful for testing purposes.
   * @default globalThis.fetch
   */
  fetcher?: typeof fetch;
  /**
   * Extra headers to be sent with every request. `content-type` and
   * `authorization` cannot be overridden.
   * @example { 'x-request-source': 'indexer' }
   * @default {}
   */
  headers?: Record<string, string>;
  /**
   * Additional settings passed to `fetch` for every request.
   * @default {}
   */
  fetchOptions?: FetchOptions;
  /**
   * The logger transport events are reported to.
   * @default the package logger
   */
  logger?: Logger;
};

export type { IHttpTransportConfig };
