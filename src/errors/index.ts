export { BaseError } from "./BaseError.js";
export { ConfigurationError } from "./ConfigurationError.js";
export { RPCError } from "./RPCError.js";
export {
  HttpError,
  InvalidResponseError,
  RequestTimeoutError,
  TransportClosedError,
} from "./TransportErrors.js";
