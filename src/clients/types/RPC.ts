import type { JSONRPCRequest } from "json-rpc-2.0";

/**
 * A JSON value as the daemon sends and receives it.
 */
type JSONValue = string | number | boolean | null | JSONValue[] | { [key: string]: JSONValue };

/**
 * Positional request parameters. The daemon decides arity and types.
 */
type JSONRPCParams = readonly unknown[];

/**
 * A request envelope as it goes on the wire. Ids are always numeric here.
 */
type RPCRequest = JSONRPCRequest & {
  id: number;
  params: JSONRPCParams;
};

/**
 * Per-request settings that apply to a single call only.
 */
type RequestOverrides = {
  /**
   * Timeout for this request, in seconds. Takes precedence over the client timeout.
   */
  timeout?: number;
  /**
   * Aborts the underlying HTTP request when signalled.
   */
  signal?: AbortSignal;
};

export type { JSONRPCParams, JSONValue, RPCRequest, RequestOverrides };
