import type { DecodedTransaction, TransactionOutput } from "./ITransaction.js";

/**
 * A base64-encoded partially signed transaction. Opaque to this client.
 */
type PSBT = string;

type PSBTRole = "creator" | "updater" | "signer" | "finalizer" | "extractor";

type AnalyzePSBTInput = {
  has_utxo: boolean;
  is_final: boolean;
  missing?: {
    pubkeys?: string[];
    signatures?: string[];
    redeemscript?: string;
    witnessscript?: string;
  };
  next?: PSBTRole;
};

type AnalyzePSBT = {
  inputs?: AnalyzePSBTInput[];
  estimated_vsize?: number;
  estimated_feerate?: number;
  fee?: number;
  next: PSBTRole;
  error?: string;
};

type CombinePSBT = PSBT;

type JoinPSBTs = PSBT;

type UtxoUpdatePSBT = PSBT;

/**
 * A descriptor for `utxoupdatepsbt`: a plain string, or an object with a derivation range.
 */
type PSBTDescriptor = string | { desc: string; range?: number | [number, number] };

type FinalizePSBT = {
  psbt?: PSBT;
  hex?: string;
  complete: boolean;
};

type WalletProcessPSBT = {
  psbt: PSBT;
  complete: boolean;
};

type DecodedPSBTInput = {
  non_witness_utxo?: DecodedTransaction;
  witness_utxo?: { amount: number; scriptPubKey: TransactionOutput["scriptPubKey"] };
  partial_signatures?: Record<string, string>;
  sighash?: string;
  redeem_script?: { asm: string; hex: string; type: string };
  witness_script?: { asm: string; hex: string; type: string };
  final_scriptSig?: { asm: string; hex: string };
  final_scriptwitness?: string[];
  unknown?: Record<string, string>;
};

type DecodedPSBTOutput = {
  redeem_script?: { asm: string; hex: string; type: string };
  witness_script?: { asm: string; hex: string; type: string };
  unknown?: Record<string, string>;
};

type DecodePSBT = {
  tx: DecodedTransaction;
  unknown: Record<string, string>;
  inputs: DecodedPSBTInput[];
  outputs: DecodedPSBTOutput[];
  fee?: number;
};

export type {
  AnalyzePSBT,
  AnalyzePSBTInput,
  CombinePSBT,
  DecodePSBT,
  DecodedPSBTInput,
  DecodedPSBTOutput,
  FinalizePSBT,
  JoinPSBTs,
  PSBT,
  PSBTDescriptor,
  PSBTRole,
  UtxoUpdatePSBT,
  WalletProcessPSBT,
};
