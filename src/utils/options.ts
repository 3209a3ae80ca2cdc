import { z } from "zod";
import { ConfigurationError } from "../errors/ConfigurationError.js";

/**
 * The default request timeout, in seconds.
 */
const DEFAULT_TIMEOUT = 5;

const FetchOptionsSchema = z
  .object({
    keepalive: z.boolean().optional(),
    redirect: z.enum(["follow", "error", "manual"]).optional(),
  })
  .strict();

const ClientOptionsSchema = z
  .object({
    headers: z.record(z.string(), z.string()).optional(),
    timeout: z.number().positive().finite().optional(),
    fetcher: z
      .custom<typeof fetch>((value) => typeof value === "function", {
        message: "Expected a fetch function",
      })
      .optional(),
    fetchOptions: FetchOptionsSchema.optional(),
  })
  .strict();

const EndpointSchema = z.string().url();

/**
 * The options accepted next to the URL and the credentials.
 */
type ClientOptions = z.infer<typeof ClientOptionsSchema>;

/**
 * Additional settings handed to `fetch` for every request.
 */
type FetchOptions = z.infer<typeof FetchOptionsSchema>;

const formatIssues = (error: z.ZodError) =>
  error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "value"}: ${issue.message}`)
    .join("; ");

/**
 * Validates client options. Authentication is only ever taken from the username and
 * password, so an `auth` key is refused before anything else is looked at.
 * @throws {ConfigurationError} If the options are not an object, contain `auth`,
 * contain an unknown key or a value of the wrong shape.
 */
const parseClientOptions = (options: unknown = {}): ClientOptions => {
  if (options === null || typeof options !== "object" || Array.isArray(options)) {
    throw new ConfigurationError("Client options must be an object");
  }

  if ("auth" in options) {
    throw new ConfigurationError("Authentication cannot be set via options!");
  }

  const parsed = ClientOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid client options: ${formatIssues(parsed.error)}`);
  }

  return parsed.data;
};

const assertIsValidEndpoint = (endpoint: unknown): string => {
  const parsed = EndpointSchema.safeParse(endpoint);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid endpoint: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
};

export { DEFAULT_TIMEOUT, assertIsValidEndpoint, formatIssues, parseClientOptions };
export type { ClientOptions, FetchOptions };
