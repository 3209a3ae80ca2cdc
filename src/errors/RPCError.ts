import type { JSONRPCError } from "json-rpc-2.0";
import { BaseError } from "./BaseError.js";

/**
 * A failure reported by the daemon in the `error` field of a response.
 * Code and message are kept exactly as the daemon sent them.
 *
 * @class RPCError
 * @extends {BaseError}
 * @implements {JSONRPCError}
 * @example
 * try {
 *   await client.getBlockHash(-1);
 * } catch (error) {
 *   if (error instanceof RPCError && error.code === -8) {
 *     // block height out of range
 *   }
 * }
 */
class RPCError extends BaseError implements JSONRPCError {
  /**
   * The numeric error code, e.g. `-8` for invalid parameters or `-13` for a locked wallet.
   */
  readonly code: number;

  /**
   * Additional error data, when the daemon provides any.
   */
  readonly data?: unknown;

  constructor(code: number, message: string, data?: unknown) {
    super(message);
    this.code = code;
    this.data = data;
  }

  /**
   * Returns the error in its JSON-RPC wire form.
   */
  public toObject(): JSONRPCError {
    return this.data === undefined
      ? { code: this.code, message: this.message }
      : { code: this.code, message: this.message, data: this.data };
  }
}

export { RPCError };
