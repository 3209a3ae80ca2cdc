import { loggerOptions } from "./logger.js";

test("logs plain JSON at info when no level is set", () => {
  expect(loggerOptions(undefined)).toEqual({ name: "coinrpc", level: "info" });
});

test("starts no pretty printer when silenced", () => {
  expect(loggerOptions("silent")).toEqual({ name: "coinrpc", level: "silent" });
});

test("pretty-prints when a level is asked for", () => {
  expect(loggerOptions("debug")).toEqual({
    name: "coinrpc",
    level: "debug",
    transport: {
      target: "pino-pretty",
      options: { colorize: true, translateTime: true },
    },
  });
});
