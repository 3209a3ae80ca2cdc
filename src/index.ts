export * from "./clients/CoinRPC.js";
export * from "./clients/RPCClient.js";
export type * from "./clients/types/Configs.js";
export type * from "./clients/types/RPC.js";
export * from "./config/loadClientConfig.js";
export * from "./errors/index.js";
export { logger } from "./logger.js";
export type { Logger } from "./logger.js";
export * from "./rpc/createCoinRPC.js";
export * from "./transport/HttpTransport.js";
export * from "./transport/MockTransport.js";
export type * from "./transport/types/IHttpTransportConfig.js";
export * from "./transport/types/ITransport.js";
export type * from "./types/index.js";
export { DEFAULT_TIMEOUT, parseClientOptions } from "./utils/options.js";
export type { ClientOptions, FetchOptions } from "./utils/options.js";
export type { RPCErrorObject, RPCResponseEnvelope } from "./utils/rpc.js";
export { version } from "./version.js";
