type ScriptSig = {
  asm: string;
  hex: string;
};

type ScriptPubKey = {
  asm: string;
  hex: string;
  type: string;
  address?: string;
  desc?: string;
};

type TransactionInput = {
  txid?: string;
  vout?: number;
  coinbase?: string;
  scriptSig?: ScriptSig;
  txinwitness?: string[];
  sequence: number;
};

type TransactionOutput = {
  value: number;
  n: number;
  scriptPubKey: ScriptPubKey;
};

/**
 * A decoded transaction, as returned by `decoderawtransaction`.
 */
type DecodedTransaction = {
  txid: string;
  hash: string;
  size: number;
  vsize: number;
  weight: number;
  version: number;
  locktime: number;
  /**
   * Peercoin transactions before protocol v0.12 carry a timestamp.
   */
  time?: number;
  vin: TransactionInput[];
  vout: TransactionOutput[];
};

/**
 * A transaction as returned by `getrawtransaction` with `verbose=true`.
 */
type RawTransaction = DecodedTransaction & {
  hex: string;
  blockhash?: string;
  confirmations?: number;
  blocktime?: number;
};

/**
 * An input of `createrawtransaction`.
 */
type RawTransactionInput = {
  txid: string;
  vout: number;
  sequence?: number;
};

/**
 * An output of `createrawtransaction`: either `{address: amount}` or `{data: hex}`.
 */
type RawTransactionOutput = Record<string, number | string>;

type TxOut = {
  bestblock: string;
  confirmations: number;
  value: number;
  scriptPubKey: ScriptPubKey;
  coinbase: boolean;
};

type MempoolAcceptResult = {
  txid: string;
  wtxid?: string;
  allowed?: boolean;
  vsize?: number;
  fees?: { base: number };
  "reject-reason"?: string;
};

export type {
  DecodedTransaction,
  MempoolAcceptResult,
  RawTransaction,
  RawTransactionInput,
  RawTransactionOutput,
  ScriptPubKey,
  ScriptSig,
  TransactionInput,
  TransactionOutput,
  TxOut,
};
