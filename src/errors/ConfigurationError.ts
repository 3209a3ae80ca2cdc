import { BaseError } from "./BaseError.js";

/**
 * Raised at construction time when the client is misconfigured,
 * e.g. when authentication is passed through the generic options.
 * @class ConfigurationError
 * @extends {BaseError}
 */
class ConfigurationError extends BaseError {}

export { ConfigurationError };
