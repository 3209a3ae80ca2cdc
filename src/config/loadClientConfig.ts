import { z } from "zod";
import type { CoinRPC } from "../clients/CoinRPC.js";
import { ConfigurationError } from "../errors/ConfigurationError.js";
import { createCoinRPC } from "../rpc/createCoinRPC.js";
import { type ClientOptions, formatIssues } from "../utils/options.js";

const EnvSchema = z.object({
  COINRPC_URL: z.string().url(),
  COINRPC_USER: z.string().min(1),
  COINRPC_PASSWORD: z.string(),
  COINRPC_TIMEOUT: z.coerce.number().positive().optional(),
});

/**
 * The connection settings of a client.
 */
type ClientConfig = {
  url: string;
  username: string;
  password: string;
  options: ClientOptions;
};

/**
 * Reads the connection settings from the environment.
 *
 * | Variable | Meaning |
 * | --- | --- |
 * | `COINRPC_URL` | The daemon RPC endpoint |
 * | `COINRPC_USER` | The RPC user |
 * | `COINRPC_PASSWORD` | The RPC password |
 * | `COINRPC_TIMEOUT` | Optional request timeout, in seconds |
 *
 * @throws {ConfigurationError} If a variable is missing or malformed.
 */
const loadClientConfig = (env: NodeJS.ProcessEnv = process.env): ClientConfig => {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid environment: ${formatIssues(parsed.error)}`);
  }

  const { COINRPC_URL, COINRPC_USER, COINRPC_PASSWORD, COINRPC_TIMEOUT } = parsed.data;

  return {
    url: COINRPC_URL,
    username: COINRPC_USER,
    password: COINRPC_PASSWORD,
    options: COINRPC_TIMEOUT === undefined ? {} : { timeout: COINRPC_TIMEOUT },
  };
};

const createCoinRPCFromEnv = (env: NodeJS.ProcessEnv = process.env): CoinRPC => {
  const { url, username, password, options } = loadClientConfig(env);
  return createCoinRPC(url, username, password, options);
};

export { createCoinRPCFromEnv, loadClientConfig };
export type { ClientConfig };
