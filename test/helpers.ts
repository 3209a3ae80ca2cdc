import { vi } from "vitest";
import { CoinRPC } from "../src/clients/CoinRPC.js";
import type { RPCRequest } from "../src/clients/types/RPC.js";
import { MockTransport } from "../src/transport/MockTransport.js";

/**
 * A client whose transport answers every request with `result`.
 */
const newMockClient = (result: unknown = null) => {
  const transport = new MockTransport(({ id }) => ({ result, error: null, id }));
  return { transport, client: new CoinRPC({ transport }) };
};

/**
 * A fetcher that answers every request with the given body and status.
 */
const respondWith = (body: string, status = 200) =>
  vi.fn<typeof fetch>(async () => new Response(body, { status }));

/**
 * A fetcher that never answers and rejects with the abort reason once its signal fires.
 */
const hangingFetch = () =>
  vi.fn<typeof fetch>(
    (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        const signal = init?.signal;
        if (signal) {
          signal.addEventListener("abort", () => reject(signal.reason));
        }
      }),
  );

/**
 * Decodes the request body sent in the given fetch call.
 */
const sentRequest = (fetcher: ReturnType<typeof respondWith>, call = 0): RPCRequest => {
  const init = fetcher.mock.calls[call]?.[1];
  if (typeof init?.body !== "string") {
    throw new Error(`fetch call ${call} has no string body`);
  }
  return JSON.parse(init.body);
};

const sentHeaders = (fetcher: ReturnType<typeof respondWith>, call = 0) =>
  fetcher.mock.calls[call]?.[1]?.headers;

export { hangingFetch, newMockClient, respondWith, sentHeaders, sentRequest };
