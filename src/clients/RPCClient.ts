import {
  JSONRPCClient,
  type JSONRPCResponse,
  createJSONRPCErrorResponse,
  createJSONRPCSuccessResponse,
} from "json-rpc-2.0";
import { RPCError } from "../errors/RPCError.js";
import { type Logger, logger as defaultLogger } from "../logger.js";
import type { ITransport } from "../transport/types/ITransport.js";
import type { RPCResponseEnvelope } from "../utils/rpc.js";
import type { IRPCClientConfig } from "./types/Configs.js";
import type { JSONRPCParams, RPCRequest, RequestOverrides } from "./types/RPC.js";

/**
 * Per-call state handed to the requester's send function. A transport failure is
 * recorded here so the caller sees the original error instead of a generic one.
 */
type SendContext = {
  overrides?: RequestOverrides;
  failure?: { error: unknown };
};

/**
 * Converts the daemon's reply into a JSON-RPC 2.0 response for the given request id.
 * One HTTP request carries one call, so the reply belongs to that request whatever
 * id it echoes.
 */
const toJSONRPCResponse = (id: number, envelope: RPCResponseEnvelope): JSONRPCResponse =>
  envelope.error
    ? createJSONRPCErrorResponse(
        id,
        envelope.error.code,
        envelope.error.message,
        envelope.error.data,
      )
    : createJSONRPCSuccessResponse(id, envelope.result);

/**
 * RPCClient wraps calls into JSON-RPC envelopes and unwraps the replies.
 * @class RPCClient
 */
class RPCClient {
  /**
   * The ITransport to be used in the client. See {@link ITransport}.
   *
   * @readonly
   * @type {ITransport}
   */
  readonly transport: ITransport;

  protected readonly logger: Logger;

  /**
   * The JSON-RPC client that matches replies to pending requests. See {@link JSONRPCClient}.
   * Request logic lives in the transport layer.
   */
  private readonly requester: JSONRPCClient<SendContext>;

  /**
   * The id of the last request sent. Ids start at 1 and are never reused by a client.
   */
  private lastId = 0;

  /**
   * Creates an instance of RPCClient.
   * @constructor
   * @param {IRPCClientConfig} config The config to be used in the client. See {@link IRPCClientConfig}.
   */
  constructor(config: IRPCClientConfig) {
    this.transport = config.transport;
    this.logger = config.logger ?? defaultLogger;
    this.requester = new JSONRPCClient<SendContext>(
      async (payload: RPCRequest, context: SendContext) => {
        try {
          const envelope = await this.transport.request(payload, context.overrides);
          this.requester.receive(toJSONRPCResponse(payload.id, envelope));
        } catch (error) {
          context.failure = { error };
          throw error;
        }
      },
    );
  }

  /**
   * Allocates the next request id. The increment runs synchronously, before any await,
   * so concurrent calls never share an id.
   */
  protected nextId(): number {
    this.lastId += 1;
    return this.lastId;
  }

  /**
   * Calls a daemon method with positional parameters.
   * @param method The daemon method name, e.g. `getblockcount`.
   * @param params The positional parameters, in the order the daemon expects them.
   * @param overrides Settings for this request only.
   * @returns The `result` field of the response, as decoded JSON.
   * @throws {RPCError} If the daemon reports an error.
   * @example
   * const height = await client.call<number>("getblockcount");
   */
  public async call<T = unknown>(
    method: string,
    params: JSONRPCParams = [],
    overrides?: RequestOverrides,
  ): Promise<T> {
    const request: RPCRequest = {
      jsonrpc: "2.0",
      id: this.nextId(),
      method,
      params,
    };

    this.logger.debug({ id: request.id, method }, "sending request");

    const context: SendContext = { overrides };
    const response = await this.requester.requestAdvanced(request, context);

    if (context.failure) {
      throw context.failure.error;
    }

    if (response.error) {
      const { code, message, data } = response.error;
      this.logger.debug({ id: request.id, method, code }, `daemon error: ${message}`);
      throw new RPCError(code, message, data);
    }

    return response.result;
  }

  /**
   * Releases the transport. Calling it again has no effect.
   */
  public async close(): Promise<void> {
    await this.transport.close();
  }
}

export { RPCClient };
