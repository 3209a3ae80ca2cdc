import type { RPCRequest, RequestOverrides } from "../../clients/types/RPC.js";
import type { RPCResponseEnvelope } from "../../utils/rpc.js";

/**
 * The transport interface.
 */
abstract class ITransport {
  /**
   * Sends a request and resolves to the decoded response envelope.
   * Daemon-reported errors are returned in the envelope, not thrown.
   * @param request - The request object.
   * @param overrides - Settings for this request only.
   */
  abstract request(request: RPCRequest, overrides?: RequestOverrides): Promise<RPCResponseEnvelope>;

  /**
   * Releases the transport. Requests still in flight are aborted.
   */
  abstract close(): Promise<void>;
}

export { ITransport };
