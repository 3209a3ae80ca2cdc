import { z } from "zod";
import { InvalidResponseError } from "../errors/TransportErrors.js";
import { version } from "../version.js";

const CONTENT_TYPE = "application/json";

/**
 * Builds the value of the `authorization` header for HTTP basic auth.
 */
const basicAuthorization = (username: string, password: string) =>
  `Basic ${Buffer.from(`${username}:${password}`).toString("base64")}`;

/**
 * Merges caller headers over the defaults. Header names are lower-cased, so a caller
 * cannot sneak a second `Content-Type` past the forced one. The content type and the
 * authorization header are always set last.
 */
const requestHeadersWithDefaults = (
  authorization: string,
  headers: Record<string, string> = {},
): Record<string, string> => {
  const merged: Record<string, string> = {
    "client-version": `coinrpc/${version}`,
    accept: CONTENT_TYPE,
  };

  for (const [name, value] of Object.entries(headers)) {
    merged[name.toLowerCase()] = value;
  }

  merged["content-type"] = CONTENT_TYPE;
  merged.authorization = authorization;

  return merged;
};

const RPCErrorObjectSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

/**
 * Accepts both JSON-RPC 1.0 replies (`error: null` on success, no `jsonrpc`)
 * and 2.0 replies (`error` absent on success, `result` absent on failure).
 * A reply must carry a `result` or a non-null `error`.
 */
const RPCResponseEnvelopeSchema = z
  .object({
    jsonrpc: z.literal("2.0").optional(),
    id: z.union([z.number(), z.string(), z.null()]).optional(),
    result: z.unknown(),
    error: RPCErrorObjectSchema.nullish(),
  })
  .refine((envelope) => envelope.result !== undefined || envelope.error != null, {
    message: "Expected a result or an error",
  });

type RPCErrorObject = z.infer<typeof RPCErrorObjectSchema>;
type RPCResponseEnvelope = z.infer<typeof RPCResponseEnvelopeSchema>;

const parseResponseEnvelope = (body: unknown): RPCResponseEnvelope => {
  const parsed = RPCResponseEnvelopeSchema.safeParse(body);
  if (!parsed.success) {
    throw new InvalidResponseError(
      `Invalid JSON-RPC response: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`,
      body,
    );
  }
  return parsed.data;
};

export {
  basicAuthorization,
  parseResponseEnvelope,
  requestHeadersWithDefaults,
};
export type { RPCErrorObject, RPCResponseEnvelope };
