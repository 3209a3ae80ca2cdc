import type { RawTransaction } from "./ITransaction.js";

/**
 * The block header, as returned by `getblockheader` with `verbose=true`.
 */
type BlockHeader = {
  hash: string;
  confirmations: number;
  height: number;
  version: number;
  versionHex: string;
  merkleroot: string;
  time: number;
  mediantime: number;
  nonce: number;
  bits: string;
  difficulty: number;
  chainwork: string;
  nTx: number;
  previousblockhash?: string;
  nextblockhash?: string;
};

/**
 * A block with the ids of its transactions (`getblock` with verbosity 1).
 */
type Block = BlockHeader & {
  strippedsize: number;
  size: number;
  weight: number;
  tx: string[];
};

/**
 * A block with every transaction decoded (`getblock` with verbosity 2).
 */
type BlockWithTransactions = Omit<Block, "tx"> & {
  tx: RawTransaction[];
};

/**
 * Per-block statistics. Only the requested keys are present when `getblockstats`
 * is called with a key filter.
 */
type BlockStats = Partial<{
  avgfee: number;
  avgfeerate: number;
  avgtxsize: number;
  blockhash: string;
  feerate_percentiles: [number, number, number, number, number];
  height: number;
  ins: number;
  maxfee: number;
  maxfeerate: number;
  maxtxsize: number;
  medianfee: number;
  mediantime: number;
  mediantxsize: number;
  minfee: number;
  minfeerate: number;
  mintxsize: number;
  outs: number;
  subsidy: number;
  swtotal_size: number;
  swtotal_weight: number;
  swtxs: number;
  time: number;
  total_out: number;
  total_size: number;
  total_weight: number;
  totalfee: number;
  txs: number;
  utxo_increase: number;
  utxo_size_inc: number;
}>;

type ChainTipStatus = "invalid" | "headers-only" | "valid-headers" | "valid-fork" | "active";

type ChainTip = {
  height: number;
  hash: string;
  branchlen: number;
  status: ChainTipStatus;
};

type BlockchainInfo = {
  chain: string;
  blocks: number;
  headers: number;
  bestblockhash: string;
  difficulty: number;
  mediantime: number;
  verificationprogress: number;
  initialblockdownload: boolean;
  chainwork: string;
  size_on_disk: number;
  pruned: boolean;
  pruneheight?: number;
  automatic_pruning?: boolean;
  prune_target_size?: number;
  warnings: string;
};

export type {
  Block,
  BlockHeader,
  BlockStats,
  BlockWithTransactions,
  BlockchainInfo,
  ChainTip,
  ChainTipStatus,
};
