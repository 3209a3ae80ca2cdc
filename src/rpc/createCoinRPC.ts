import { CoinRPC } from "../clients/CoinRPC.js";
import type { RPCClient } from "../clients/RPCClient.js";
import type { Logger } from "../logger.js";
import { HttpTransport } from "../transport/HttpTransport.js";
import { type ClientOptions, assertIsValidEndpoint, parseClientOptions } from "../utils/options.js";

/**
 * Creates a client for the daemon at `url`, authenticating with HTTP basic auth.
 * The options are validated and the transport is set up before this returns.
 *
 * @param url The daemon RPC endpoint.
 * @param username The RPC user.
 * @param password The RPC password.
 * @param options Extra headers, the timeout in seconds, a custom fetcher and
 * additional fetch settings. See {@link ClientOptions}.
 * @param logger The logger the client and its transport report to.
 * @throws {ConfigurationError} If the URL is invalid, `options` contains `auth`, or any
 * option is unknown or malformed.
 * @example
 * const client = createCoinRPC("http://127.0.0.1:9904", "user", "pass", { timeout: 12 });
 */
const createCoinRPC = (
  url: string,
  username: string,
  password: string,
  options: ClientOptions = {},
  logger?: Logger,
): CoinRPC => {
  const endpoint = assertIsValidEndpoint(url);
  const { headers, timeout, fetcher, fetchOptions } = parseClientOptions(options);

  const transport = new HttpTransport({
    endpoint,
    username,
    password,
    headers,
    timeout,
    fetcher,
    fetchOptions,
    logger,
  });

  return new CoinRPC({ transport, logger });
};

/**
 * Runs `fn` with the client and closes the client afterwards, whether `fn`
 * resolves or throws.
 * @example
 * const hash = await withCoinRPC(createCoinRPC(url, user, pass), (rpc) => rpc.getBestBlockHash());
 */
const withCoinRPC = async <C extends RPCClient, T>(
  client: C,
  fn: (client: C) => Promise<T>,
): Promise<T> => {
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
};

export { createCoinRPC, withCoinRPC };
