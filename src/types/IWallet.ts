type AddressType = "legacy" | "p2sh-segwit" | "bech32" | "bech32m";

type SighashType =
  | "ALL"
  | "NONE"
  | "SINGLE"
  | "ALL|ANYONECANPAY"
  | "NONE|ANYONECANPAY"
  | "SINGLE|ANYONECANPAY";

type SendToAddress = string;

type ReceivedByAddress = {
  involvesWatchonly?: boolean;
  address: string;
  amount: number;
  confirmations: number;
  label: string;
  txids: string[];
};

type UnspentOutput = {
  txid: string;
  vout: number;
  address?: string;
  label?: string;
  scriptPubKey: string;
  amount: number;
  confirmations: number;
  redeemScript?: string;
  witnessScript?: string;
  spendable: boolean;
  solvable: boolean;
  desc?: string;
  safe: boolean;
};

/**
 * Filters for `listunspent`, sent as the fifth positional parameter.
 */
type ListUnspentQueryOptions = {
  minimumAmount?: number | string;
  maximumAmount?: number | string;
  maximumCount?: number;
  minimumSumAmount?: number | string;
};

type FundRawTransactionOptions = {
  changeAddress?: string;
  changePosition?: number;
  change_type?: AddressType;
  includeWatching?: boolean;
  lockUnspents?: boolean;
  fee_rate?: number | string;
  feeRate?: number | string;
  subtractFeeFromOutputs?: number[];
  replaceable?: boolean;
  conf_target?: number;
};

type FundRawTransaction = {
  hex: string;
  fee: number;
  changepos: number;
};

/**
 * A previous output that `signrawtransactionwithwallet` cannot look up by itself.
 */
type PreviousTransactionOutput = {
  txid: string;
  vout: number;
  scriptPubKey: string;
  redeemScript?: string;
  witnessScript?: string;
  amount?: number | string;
};

type SignRawTransactionWithWallet = {
  hex: string;
  complete: boolean;
  errors?: {
    txid: string;
    vout: number;
    scriptSig: string;
    sequence: number;
    error: string;
  }[];
};

type CreateWallet = {
  name: string;
  warning: string;
};

type LoadWallet = CreateWallet;

type UnloadWallet = {
  warning?: string;
};

type WalletInfo = {
  walletname: string;
  walletversion: number;
  format?: string;
  balance: number;
  unconfirmed_balance: number;
  immature_balance: number;
  txcount: number;
  keypoololdest?: number;
  keypoolsize: number;
  keypoolsize_hd_internal?: number;
  unlocked_until?: number;
  paytxfee: number;
  hdseedid?: string;
  private_keys_enabled: boolean;
  avoid_reuse?: boolean;
  descriptors?: boolean;
};

type WalletTransactionCategory = "send" | "receive" | "generate" | "immature" | "orphan";

type WalletTransactionDetail = {
  involvesWatchonly?: boolean;
  address?: string;
  category: WalletTransactionCategory;
  amount: number;
  label?: string;
  vout: number;
  fee?: number;
  abandoned?: boolean;
};

type WalletTransaction = {
  amount: number;
  fee?: number;
  confirmations: number;
  blockhash?: string;
  blockheight?: number;
  blockindex?: number;
  blocktime?: number;
  txid: string;
  walletconflicts: string[];
  time: number;
  timereceived: number;
  comment?: string;
  "bip125-replaceable"?: "yes" | "no" | "unknown";
  details: WalletTransactionDetail[];
  hex: string;
};

type ListTransactionsEntry = WalletTransactionDetail & {
  confirmations: number;
  blockhash?: string;
  blockheight?: number;
  blocktime?: number;
  txid: string;
  time: number;
  timereceived: number;
};

export type {
  AddressType,
  CreateWallet,
  FundRawTransaction,
  FundRawTransactionOptions,
  ListTransactionsEntry,
  ListUnspentQueryOptions,
  LoadWallet,
  PreviousTransactionOutput,
  ReceivedByAddress,
  SendToAddress,
  SighashType,
  SignRawTransactionWithWallet,
  UnloadWallet,
  UnspentOutput,
  WalletInfo,
  WalletTransaction,
  WalletTransactionCategory,
  WalletTransactionDetail,
};
