import type { RPCRequest, RequestOverrides } from "../clients/types/RPC.js";
import { TransportClosedError } from "../errors/TransportErrors.js";
import { type RPCResponseEnvelope, parseResponseEnvelope } from "../utils/rpc.js";
import type { ITransport } from "./types/ITransport.js";

/**
 * Builds the response body for a request. It may also throw, which simulates a
 * transport-layer failure.
 */
type MockHandler = (request: RPCRequest) => unknown;

/**
 * The MockTransport is a transport class for testing purposes.
 * Every request is recorded in {@link MockTransport.requests} before the handler runs.
 *
 * @class MockTransport
 * @typedef {MockTransport}
 * @implements {ITransport}
 * @example
 * const transport = new MockTransport(({ id }) => ({ result: 42, error: null, id }));
 */
class MockTransport implements ITransport {
  /**
   * The requests seen so far, in the order they were sent.
   */
  public readonly requests: RPCRequest[] = [];

  /**
   * The overrides passed along with each recorded request.
   */
  public readonly overrides: (RequestOverrides | undefined)[] = [];

  public closed = false;

  private handler: MockHandler;

  /**
   * Creates an instance of MockTransport.
   *
   * @constructor
   * @param {MockHandler} handler The testing handler.
   */
  constructor(handler: MockHandler) {
    this.handler = handler;
  }

  public async request(
    requestObject: RPCRequest,
    overrides?: RequestOverrides,
  ): Promise<RPCResponseEnvelope> {
    if (this.closed) {
      throw new TransportClosedError();
    }

    this.requests.push(requestObject);
    this.overrides.push(overrides);
    return parseResponseEnvelope(await this.handler(requestObject));
  }

  public async close(): Promise<void> {
    this.closed = true;
  }
}

export { MockTransport };
export type { MockHandler };
