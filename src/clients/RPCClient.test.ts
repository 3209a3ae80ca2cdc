import { pino } from "pino";
import { RPCError } from "../errors/RPCError.js";
import { InvalidResponseError, TransportClosedError } from "../errors/TransportErrors.js";
import { MockTransport } from "../transport/MockTransport.js";
import { RPCClient } from "./RPCClient.js";

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

test("returns the result of a successful response", async () => {
  const transport = new MockTransport(() => ({ result: 42, error: null, id: 1 }));
  const client = new RPCClient({ transport });

  const result = await client.call("getblockcount");

  expect(result).toBe(42);
  expect(transport.requests).toEqual([
    { jsonrpc: "2.0", id: 1, method: "getblockcount", params: [] },
  ]);
});

test("returns a null result as-is", async () => {
  const transport = new MockTransport(({ id }) => ({ result: null, error: null, id }));
  const client = new RPCClient({ transport });

  expect(await client.call("walletlock")).toBeNull();
});

test("accepts JSON-RPC 2.0 replies without an error field", async () => {
  const transport = new MockTransport(({ id }) => ({ jsonrpc: "2.0", result: ["a", "b"], id }));
  const client = new RPCClient({ transport });

  expect(await client.call("listwallets")).toEqual(["a", "b"]);
});

test("raises RPCError with the daemon code and message", async () => {
  const transport = new MockTransport(() => ({
    result: null,
    error: { code: -8, message: "bad" },
    id: 1,
  }));
  const client = new RPCClient({ transport });

  const promise = client.call("getblockhash", [-1]);

  await expect(promise).rejects.toBeInstanceOf(RPCError);
  await expect(promise).rejects.toMatchObject({ name: "RPCError", code: -8, message: "bad" });
});

test("keeps the error data sent by the daemon", async () => {
  const transport = new MockTransport(({ id }) => ({
    result: null,
    error: { code: -26, message: "rejected", data: { reason: "dust" } },
    id,
  }));
  const client = new RPCClient({ transport });

  const error = await client.call("sendrawtransaction", ["00"]).catch((e: unknown) => e);

  expect(error).toBeInstanceOf(RPCError);
  if (error instanceof RPCError) {
    expect(error.data).toEqual({ reason: "dust" });
    expect(error.toObject()).toEqual({ code: -26, message: "rejected", data: { reason: "dust" } });
  }
});

test("raises RPCError for a JSON-RPC 2.0 error reply without a result", async () => {
  const transport = new MockTransport(({ id }) => ({
    jsonrpc: "2.0",
    error: { code: -32601, message: "Method not found" },
    id,
  }));
  const client = new RPCClient({ transport });

  await expect(client.call("getblocktemplate")).rejects.toMatchObject({
    name: "RPCError",
    code: -32601,
    message: "Method not found",
  });
});

test("matches a reply to its request even when the echoed id differs", async () => {
  const transport = new MockTransport(() => ({ result: "pong", error: null, id: 99 }));
  const client = new RPCClient({ transport });

  expect(await client.call("ping")).toBe("pong");
  expect(await client.call("ping")).toBe("pong");
});

test("sends the params in the given order", async () => {
  const transport = new MockTransport(({ id }) => ({ result: {}, error: null, id }));
  const client = new RPCClient({ transport });

  await client.call("getblock", ["00ff", 2]);

  expect(transport.requests[0]?.params).toEqual(["00ff", 2]);
});

test("allocates ids starting at 1 and never reuses them", async () => {
  const transport = new MockTransport(({ id }) => ({ result: id, error: null, id }));
  const client = new RPCClient({ transport });

  await client.call("getblockcount");
  await client.call("getblockcount");
  await client.call("getblockcount");

  expect(transport.requests.map(({ id }) => id)).toEqual([1, 2, 3]);
});

test("gives concurrent calls distinct, increasing ids", async () => {
  // Later requests answer first, so responses arrive out of order.
  const transport = new MockTransport(async ({ id }) => {
    await sleep(30 - id * 2);
    return { result: id, error: null, id };
  });
  const client = new RPCClient({ transport });

  const results = await Promise.all(
    Array.from({ length: 10 }, () => client.call<number>("getblockcount")),
  );

  expect(results).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
  expect(new Set(transport.requests.map(({ id }) => id)).size).toBe(10);
});

test("keeps a separate id counter per client", async () => {
  const transport = new MockTransport(({ id }) => ({ result: id, error: null, id }));
  const first = new RPCClient({ transport });
  const second = new RPCClient({ transport });

  await first.call("uptime");
  await first.call("uptime");
  await second.call("uptime");

  expect(transport.requests.map(({ id }) => id)).toEqual([1, 2, 1]);
});

test("passes per-request overrides to the transport", async () => {
  const transport = new MockTransport(({ id }) => ({ result: null, error: null, id }));
  const client = new RPCClient({ transport });

  await client.call("getblockstats", [1000, null], { timeout: 30 });
  await client.call("uptime");

  expect(transport.overrides).toEqual([{ timeout: 30 }, undefined]);
});

test("propagates transport errors unchanged", async () => {
  const failure = new TypeError("fetch failed");
  const transport = new MockTransport(() => {
    throw failure;
  });
  const client = new RPCClient({ transport });

  await expect(client.call("getblockcount")).rejects.toBe(failure);
});

test("rejects a body that is not a response envelope", async () => {
  const transport = new MockTransport(() => [1, 2, 3]);
  const client = new RPCClient({ transport });

  await expect(client.call("getblockcount")).rejects.toBeInstanceOf(InvalidResponseError);
});

test("keeps the original transport error when concurrent calls succeed", async () => {
  const failure = new TypeError("fetch failed");
  const transport = new MockTransport(({ id }) => {
    if (id === 2) {
      throw failure;
    }
    return { result: id, error: null, id };
  });
  const client = new RPCClient({ transport });

  const outcomes = await Promise.allSettled([
    client.call("uptime"),
    client.call("uptime"),
    client.call("uptime"),
  ]);

  expect(outcomes).toEqual([
    { status: "fulfilled", value: 1 },
    { status: "rejected", reason: failure },
    { status: "fulfilled", value: 3 },
  ]);
});

test("reports requests to the logger it was given", async () => {
  const log = pino({ level: "silent" });
  const debug = vi.spyOn(log, "debug");
  const transport = new MockTransport(({ id }) => ({ result: null, error: null, id }));
  const client = new RPCClient({ transport, logger: log });

  await client.call("getblockcount");

  expect(debug).toHaveBeenCalledWith({ id: 1, method: "getblockcount" }, "sending request");
});

test("close releases the transport", async () => {
  const transport = new MockTransport(({ id }) => ({ result: 1, error: null, id }));
  const client = new RPCClient({ transport });

  await client.close();

  expect(transport.closed).toBe(true);
  await expect(client.call("getblockcount")).rejects.toBeInstanceOf(TransportClosedError);
});
