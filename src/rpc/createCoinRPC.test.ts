import { pino } from "pino";
import { newMockClient, respondWith, sentHeaders, sentRequest } from "../../test/helpers.js";
import { testEnv } from "../../test/testEnv.js";
import type { CoinRPC } from "../clients/CoinRPC.js";
import { ConfigurationError } from "../errors/ConfigurationError.js";
import { RPCError } from "../errors/RPCError.js";
import { HttpError, InvalidResponseError } from "../errors/TransportErrors.js";
import { HttpTransport } from "../transport/HttpTransport.js";
import type { ClientOptions } from "../utils/options.js";
import { createCoinRPC, withCoinRPC } from "./createCoinRPC.js";

const httpTransportOf = (client: CoinRPC): HttpTransport => {
  if (!(client.transport instanceof HttpTransport)) {
    throw new Error("expected an HTTP transport");
  }
  return client.transport;
};

const connect = (fetcher: typeof fetch, options: ClientOptions = {}) =>
  createCoinRPC(testEnv.endpoint, testEnv.username, testEnv.password, { ...options, fetcher });

describe("createCoinRPC", () => {
  test("sets up the HTTP transport right away", () => {
    const client = connect(respondWith("{}"));

    const transport = httpTransportOf(client);
    expect(transport.endpoint).toBe(testEnv.endpoint);
    expect(transport.closed).toBe(false);
    expect(transport.headers.authorization).toBe(testEnv.authorization);
  });

  test("uses a 5 second timeout unless told otherwise", () => {
    expect(httpTransportOf(connect(respondWith("{}"))).timeout).toBe(5);
    expect(httpTransportOf(connect(respondWith("{}"), { timeout: 12 })).timeout).toBe(12);
  });

  test("always sends application/json as the content type", async () => {
    const fetcher = respondWith(JSON.stringify({ result: 3, error: null, id: 1 }));
    const client = createCoinRPC(testEnv.endpoint, testEnv.username, testEnv.password, {
      headers: { "content-type": "text/plain" },
      fetcher,
    });

    await client.getBlockCount();
    await client.getBlockCount();

    expect(sentHeaders(fetcher, 0)).toMatchObject({ "content-type": "application/json" });
    expect(sentHeaders(fetcher, 1)).toMatchObject({ "content-type": "application/json" });
  });

  test("refuses authentication passed through the options", () => {
    const options = { auth: ["other", "test-secret"], timeout: 12 };

    expect(() =>
      createCoinRPC(testEnv.endpoint, testEnv.username, testEnv.password, options),
    ).toThrow(ConfigurationError);
  });

  test("refuses an invalid URL", () => {
    expect(() => createCoinRPC("127.0.0.1 9904", testEnv.username, testEnv.password)).toThrow(
      ConfigurationError,
    );
  });

  test("returns the result field of the reply", async () => {
    const client = connect(respondWith(JSON.stringify({ result: 42, error: null, id: 1 })));

    expect(await client.getBlockCount()).toBe(42);
  });

  test("raises RPCError for a daemon error", async () => {
    const body = JSON.stringify({ result: null, error: { code: -8, message: "bad" }, id: 1 });
    const client = connect(respondWith(body, 500));

    const promise = client.getBlockHash(-1);

    await expect(promise).rejects.toBeInstanceOf(RPCError);
    await expect(promise).rejects.toMatchObject({ code: -8, message: "bad" });
  });

  test("raises HttpError for an error status whose JSON body is not a reply", async () => {
    const client = connect(respondWith(JSON.stringify({ status: "unavailable" }), 503));

    await expect(client.getBlockCount()).rejects.toBeInstanceOf(HttpError);
  });

  test("raises InvalidResponseError for an empty JSON reply", async () => {
    const client = connect(respondWith("{}"));

    await expect(client.getBestBlockHash()).rejects.toBeInstanceOf(InvalidResponseError);
  });

  test("hands the logger to the transport", async () => {
    const log = pino({ level: "silent" });
    const debug = vi.spyOn(log, "debug");
    const client = createCoinRPC(
      testEnv.endpoint,
      testEnv.username,
      testEnv.password,
      { fetcher: respondWith("{}") },
      log,
    );

    await client.close();

    expect(debug).toHaveBeenCalledWith({ endpoint: testEnv.endpoint }, "HTTP transport closed");
  });

  test("sends the convenience method params over the wire", async () => {
    const fetcher = respondWith(JSON.stringify({ result: "f0".repeat(32), error: null, id: 1 }));
    const client = connect(fetcher);

    await client.sendToAddress("tpc1qexampleaddress", 0.5);

    expect(sentRequest(fetcher)).toEqual({
      jsonrpc: "2.0",
      id: 1,
      method: "sendtoaddress",
      params: ["tpc1qexampleaddress", 0.5, null, null, true, false],
    });
  });
});

describe("withCoinRPC", () => {
  test("closes the client after the callback resolves", async () => {
    const { client, transport } = newMockClient(812);

    const height = await withCoinRPC(client, (rpc) => rpc.getBlockCount());

    expect(height).toBe(812);
    expect(transport.closed).toBe(true);
  });

  test("closes the client when the callback throws", async () => {
    const failure = new Error("indexer crashed");
    const { client, transport } = newMockClient();

    await expect(
      withCoinRPC(client, async () => {
        throw failure;
      }),
    ).rejects.toBe(failure);
    expect(transport.closed).toBe(true);
  });

  test("closes the client when a call fails", async () => {
    const client = connect(
      respondWith(JSON.stringify({ result: null, error: { code: -13, message: "locked" }, id: 1 })),
    );

    await expect(withCoinRPC(client, (rpc) => rpc.walletLock())).rejects.toBeInstanceOf(RPCError);
    expect(httpTransportOf(client).closed).toBe(true);
  });
});
