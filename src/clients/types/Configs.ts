import type { Logger } from "../../logger.js";
import type { ITransport } from "../../transport/types/ITransport.js";

/**
 * The configuration of the RPC client.
 */
type IRPCClientConfig = {
  /**
   * The transport used to reach the daemon. See {@link ITransport}.
   */
  transport: ITransport;
  /**
   * The logger requests are reported to. Defaults to the package logger.
   */
  logger?: Logger;
};

export type { IRPCClientConfig };
