export type * from "./IBlock.js";
export type * from "./INetwork.js";
export type * from "./IPSBT.js";
export type * from "./ITransaction.js";
export type * from "./IWallet.js";
