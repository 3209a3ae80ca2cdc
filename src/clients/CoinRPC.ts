import type {
  Block,
  BlockHeader,
  BlockStats,
  BlockWithTransactions,
  BlockchainInfo,
  ChainTip,
} from "../types/IBlock.js";
import type {
  AddressValidation,
  EstimateMode,
  MempoolEntry,
  MempoolInfo,
  MiningInfo,
  NetworkInfo,
  PeerInfo,
  SmartFeeEstimate,
} from "../types/INetwork.js";
import type {
  AnalyzePSBT,
  CombinePSBT,
  DecodePSBT,
  FinalizePSBT,
  JoinPSBTs,
  PSBT,
  PSBTDescriptor,
  UtxoUpdatePSBT,
  WalletProcessPSBT,
} from "../types/IPSBT.js";
import type {
  DecodedTransaction,
  MempoolAcceptResult,
  RawTransaction,
  RawTransactionInput,
  RawTransactionOutput,
  TxOut,
} from "../types/ITransaction.js";
import type {
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
} from "../types/IWallet.js";
import { RPCClient } from "./RPCClient.js";

type SendToAddressOptions = {
  /**
   * What the transaction is for. Stored in the wallet only.
   */
  comment?: string | null;
  /**
   * Who the transaction is sent to. Stored in the wallet only.
   */
  commentTo?: string | null;
  /**
   * Deduct the fee from the amount sent.
   * @default true
   */
  subtractFeeFromAmount?: boolean;
  /**
   * Avoid spending from dirty addresses. Needs the `avoid_reuse` wallet flag.
   * @default false
   */
  avoidReuse?: boolean;
};

type ListReceivedByAddressOptions = {
  /**
   * @default 1
   */
  minconf?: number;
  /**
   * Include addresses that have not received any payment.
   * @default false
   */
  includeEmpty?: boolean;
  includeWatchonly?: boolean | null;
  /**
   * Only return this address.
   */
  addressFilter?: string | null;
};

type ListUnspentOptions = {
  /**
   * @default 1
   */
  minconf?: number;
  /**
   * @default 9999999
   */
  maxconf?: number;
  /**
   * Only return outputs paying to these addresses.
   * @default []
   */
  addresses?: string[];
  /**
   * Include outputs that are not safe to spend.
   * @default true
   */
  includeUnsafe?: boolean;
  /**
   * @default {}
   */
  queryOptions?: ListUnspentQueryOptions;
};

type CreateWalletOptions = {
  /**
   * Encrypt the wallet with this passphrase. An empty string leaves it unencrypted.
   */
  passphrase: string;
  /**
   * Watch-only wallet without private keys.
   * @default false
   */
  disablePrivateKeys?: boolean;
  /**
   * A wallet with no keys and no HD seed.
   * @default false
   */
  blank?: boolean;
  /**
   * @default false
   */
  avoidReuse?: boolean;
  /**
   * @default false
   */
  descriptors?: boolean;
  /**
   * `null` leaves the startup list unchanged.
   * @default true
   */
  loadOnStartup?: boolean | null;
};

type OptimizeUtxoSetOptions = {
  /**
   * Broadcast the transaction after building it.
   * @default false
   */
  transmit?: boolean;
  /**
   * Only split coins from this address. All available coins are used otherwise.
   */
  sourceAddress?: string | null;
};

type WalletProcessPsbtOptions = {
  /**
   * @default true
   */
  sign?: boolean;
  /**
   * Used when the PSBT does not specify one.
   * @default "ALL"
   */
  sighashType?: SighashType;
  /**
   * Include BIP32 derivation paths for known public keys.
   * @default true
   */
  bip32Derivs?: boolean;
};

type ListTransactionsOptions = {
  /**
   * `"*"` lists transactions of every label.
   * @default "*"
   */
  label?: string;
  /**
   * @default 10
   */
  count?: number;
  /**
   * @default 0
   */
  skip?: number;
  /**
   * @default false
   */
  includeWatchonly?: boolean;
};

/**
 * CoinRPC exposes the daemon's RPC methods as typed calls.
 * Every method builds the positional parameter list the daemon expects and hands it
 * to {@link RPCClient.call}. Nothing is validated locally; the daemon decides.
 *
 * See https://developer.bitcoin.org/reference/rpc/ for the daemon side of each method.
 *
 * @class CoinRPC
 * @extends {RPCClient}
 * @example
 * import { CoinRPC, HttpTransport } from 'coinrpc';
 *
 * const client = new CoinRPC({
 *   transport: new HttpTransport({
 *     endpoint: 'http://127.0.0.1:9904',
 *     username: 'user',
 *     password: 'pass',
 *   }),
 * });
 */
class CoinRPC extends RPCClient {
  // Blockchain

  public async getBlockchainInfo(): Promise<BlockchainInfo> {
    return this.call<BlockchainInfo>("getblockchaininfo");
  }

  public async getBestBlockHash(): Promise<string> {
    return this.call<string>("getbestblockhash");
  }

  public async getBlockCount(): Promise<number> {
    return this.call<number>("getblockcount");
  }

  /**
   * Returns the hash of the block at the given height of the active chain.
   * @param height The block height.
   */
  public async getBlockHash(height: number): Promise<string> {
    return this.call<string>("getblockhash", [height]);
  }

  /**
   * Returns the block header.
   * @param blockHash The block hash.
   * @param verbose `false` returns the serialized header as hex.
   */
  public getBlockHeader(blockHash: string, verbose?: true): Promise<BlockHeader>;
  public getBlockHeader(blockHash: string, verbose: false): Promise<string>;
  public async getBlockHeader(blockHash: string, verbose = true): Promise<BlockHeader | string> {
    return this.call<BlockHeader | string>("getblockheader", [blockHash, verbose]);
  }

  /**
   * Returns statistics about a block.
   * @param hashOrHeight The block hash or height.
   * @param keys Only return these statistics. All of them are returned when none are given.
   * @example
   * const { avgfee, txs } = await client.getBlockStats(1000, "avgfee", "txs");
   */
  public async getBlockStats(
    hashOrHeight: string | number,
    ...keys: string[]
  ): Promise<BlockStats> {
    return this.call<BlockStats>("getblockstats", [hashOrHeight, keys.length > 0 ? keys : null]);
  }

  /**
   * Returns a block.
   * @param blockHash The block hash.
   * @param verbosity 0 for the serialized block as hex, 1 for the block with transaction
   * ids, 2 for the block with every transaction decoded.
   */
  public getBlock(blockHash: string, verbosity: 0): Promise<string>;
  public getBlock(blockHash: string, verbosity?: 1): Promise<Block>;
  public getBlock(blockHash: string, verbosity: 2): Promise<BlockWithTransactions>;
  public async getBlock(
    blockHash: string,
    verbosity: 0 | 1 | 2 = 1,
  ): Promise<string | Block | BlockWithTransactions> {
    return this.call<string | Block | BlockWithTransactions>("getblock", [blockHash, verbosity]);
  }

  public async getChainTips(): Promise<ChainTip[]> {
    return this.call<ChainTip[]>("getchaintips");
  }

  public async getDifficulty(): Promise<number> {
    return this.call<number>("getdifficulty");
  }

  public async getMempoolInfo(): Promise<MempoolInfo> {
    return this.call<MempoolInfo>("getmempoolinfo");
  }

  /**
   * Returns the ids of the transactions in the mempool, or the entries keyed by id
   * when `verbose` is set.
   */
  public getRawMempool(verbose?: false): Promise<string[]>;
  public getRawMempool(verbose: true): Promise<Record<string, MempoolEntry>>;
  public async getRawMempool(verbose = false): Promise<string[] | Record<string, MempoolEntry>> {
    return this.call<string[] | Record<string, MempoolEntry>>("getrawmempool", [verbose]);
  }

  public async getMempoolEntry(txid: string): Promise<MempoolEntry> {
    return this.call<MempoolEntry>("getmempoolentry", [txid]);
  }

  /**
   * Returns an unspent transaction output, or `null` if it is spent or unknown.
   * @param txid The transaction id.
   * @param n The output index.
   * @param includeMempool Whether outputs spent in the mempool count as spent.
   */
  public async getTxOut(txid: string, n: number, includeMempool = true): Promise<TxOut | null> {
    return this.call<TxOut | null>("gettxout", [txid, n, includeMempool]);
  }

  // Mining and network

  public async getMiningInfo(): Promise<MiningInfo> {
    return this.call<MiningInfo>("getmininginfo");
  }

  /**
   * Returns the estimated network hashes per second.
   * @param nblocks `-1` averages since the last difficulty change, otherwise over this
   * many blocks.
   * @param height Estimate at this height instead of the tip.
   */
  public async getNetworkHashPs(nblocks = -1, height: number | null = null): Promise<number> {
    return this.call<number>("getnetworkhashps", [nblocks, height]);
  }

  public async getNetworkInfo(): Promise<NetworkInfo> {
    return this.call<NetworkInfo>("getnetworkinfo");
  }

  public async getConnectionCount(): Promise<number> {
    return this.call<number>("getconnectioncount");
  }

  public async getPeerInfo(): Promise<PeerInfo[]> {
    return this.call<PeerInfo[]>("getpeerinfo");
  }

  /**
   * Returns the number of seconds the daemon has been running.
   */
  public async uptime(): Promise<number> {
    return this.call<number>("uptime");
  }

  /**
   * Estimates the fee rate needed for a transaction to confirm within `confTarget` blocks.
   */
  public async estimateSmartFee(
    confTarget: number,
    estimateMode: EstimateMode = "CONSERVATIVE",
  ): Promise<SmartFeeEstimate> {
    return this.call<SmartFeeEstimate>("estimatesmartfee", [confTarget, estimateMode]);
  }

  // Raw transactions

  /**
   * Returns a transaction. Transactions outside the mempool need `-txindex` on the
   * daemon, or the hash of the block that contains them.
   * @param txid The transaction id.
   * @param verbose `false` returns the serialized transaction as hex.
   * @param blockHash The block to look the transaction up in.
   */
  public getRawTransaction(
    txid: string,
    verbose?: true,
    blockHash?: string | null,
  ): Promise<RawTransaction>;
  public getRawTransaction(
    txid: string,
    verbose: false,
    blockHash?: string | null,
  ): Promise<string>;
  public async getRawTransaction(
    txid: string,
    verbose = true,
    blockHash: string | null = null,
  ): Promise<RawTransaction | string> {
    return this.call<RawTransaction | string>("getrawtransaction", [txid, verbose, blockHash]);
  }

  public async decodeRawTransaction(hexstring: string): Promise<DecodedTransaction> {
    return this.call<DecodedTransaction>("decoderawtransaction", [hexstring]);
  }

  /**
   * Creates an unsigned transaction spending the given inputs.
   * @param inputs The outputs to spend.
   * @param outputs `{address: amount}` or `{data: hex}` entries.
   * @param locktime Raw locktime. A non-zero value also locktime-activates the inputs.
   * @returns The serialized transaction as hex.
   */
  public async createRawTransaction(
    inputs: RawTransactionInput[],
    outputs: RawTransactionOutput[],
    locktime = 0,
  ): Promise<string> {
    return this.call<string>("createrawtransaction", [inputs, outputs, locktime]);
  }

  /**
   * Adds inputs, and a change output when needed, until the transaction covers its outputs.
   * @param hexstring The serialized transaction.
   * @param options Funding options, see the daemon reference.
   * @param iswitness Whether `hexstring` is a serialized witness transaction. The daemon
   * guesses when `null`.
   */
  public async fundRawTransaction(
    hexstring: string,
    options: FundRawTransactionOptions = {},
    iswitness: boolean | null = null,
  ): Promise<FundRawTransaction> {
    return this.call<FundRawTransaction>("fundrawtransaction", [hexstring, options, iswitness]);
  }

  /**
   * Signs a transaction with the keys of the wallet.
   * @param hexstring The serialized transaction.
   * @param prevtxs Previous outputs the wallet does not know about.
   * @param sighashType The signature hash type.
   */
  public async signRawTransactionWithWallet(
    hexstring: string,
    prevtxs: PreviousTransactionOutput[] = [],
    sighashType: SighashType = "ALL",
  ): Promise<SignRawTransactionWithWallet> {
    return this.call<SignRawTransactionWithWallet>("signrawtransactionwithwallet", [
      hexstring,
      prevtxs,
      sighashType,
    ]);
  }

  /**
   * Broadcasts a signed transaction.
   * @returns The transaction id.
   */
  public async sendRawTransaction(hexstring: string): Promise<string> {
    return this.call<string>("sendrawtransaction", [hexstring]);
  }

  /**
   * Checks whether the daemon would accept the transactions into its mempool,
   * without broadcasting them.
   */
  public async testMempoolAccept(rawtxs: string[]): Promise<MempoolAcceptResult[]> {
    return this.call<MempoolAcceptResult[]>("testmempoolaccept", [rawtxs]);
  }

  // Wallet

  /**
   * Sends an amount to an address.
   * @param address The address to send to.
   * @param amount The amount in coins, e.g. `0.1`.
   * @returns The transaction id.
   * @example
   * const txid = await client.sendToAddress("tpc1q...", 0.1, { subtractFeeFromAmount: false });
   */
  public async sendToAddress(
    address: string,
    amount: number,
    {
      comment = null,
      commentTo = null,
      subtractFeeFromAmount = true,
      avoidReuse = false,
    }: SendToAddressOptions = {},
  ): Promise<SendToAddress> {
    return this.call<SendToAddress>("sendtoaddress", [
      address,
      amount,
      comment,
      commentTo,
      subtractFeeFromAmount,
      avoidReuse,
    ]);
  }

  /**
   * Returns a new address for receiving payments.
   * @param label The label of the address. It is created if it does not exist.
   * @param addressType The address type.
   */
  public async getNewAddress(
    label: string | null = null,
    addressType: AddressType = "bech32",
  ): Promise<string> {
    return this.call<string>("getnewaddress", [label, addressType]);
  }

  /**
   * Adds a public key to the wallet as watch-only.
   * @param pubkey The hex-encoded public key.
   * @param label The label of the key.
   * @param rescan Rescan the chain for transactions of the key.
   */
  public async importPubKey(pubkey: string, label = "", rescan = true): Promise<null> {
    return this.call<null>("importpubkey", [pubkey, label, rescan]);
  }

  /**
   * Lists the balances received by each address.
   */
  public async listReceivedByAddress({
    minconf = 1,
    includeEmpty = false,
    includeWatchonly = null,
    addressFilter = null,
  }: ListReceivedByAddressOptions = {}): Promise<ReceivedByAddress[]> {
    return this.call<ReceivedByAddress[]>("listreceivedbyaddress", [
      minconf,
      includeEmpty,
      includeWatchonly,
      addressFilter,
    ]);
  }

  /**
   * Lists the unspent outputs of the wallet with between `minconf` and `maxconf`
   * confirmations.
   * @example
   * const utxos = await client.listUnspent({
   *   addresses: ["tpc1q..."],
   *   queryOptions: { minimumAmount: 1 },
   * });
   */
  public async listUnspent({
    minconf = 1,
    maxconf = 9999999,
    addresses = [],
    includeUnsafe = true,
    queryOptions = {},
  }: ListUnspentOptions = {}): Promise<UnspentOutput[]> {
    return this.call<UnspentOutput[]>("listunspent", [
      minconf,
      maxconf,
      addresses,
      includeUnsafe,
      queryOptions,
    ]);
  }

  /**
   * Lists the most recent wallet transactions, newest last.
   */
  public async listTransactions({
    label = "*",
    count = 10,
    skip = 0,
    includeWatchonly = false,
  }: ListTransactionsOptions = {}): Promise<ListTransactionsEntry[]> {
    return this.call<ListTransactionsEntry[]>("listtransactions", [
      label,
      count,
      skip,
      includeWatchonly,
    ]);
  }

  public async getTransaction(txid: string, includeWatchonly = false): Promise<WalletTransaction> {
    return this.call<WalletTransaction>("gettransaction", [txid, includeWatchonly]);
  }

  /**
   * Returns the total available balance of the wallet.
   * @param minconf Only count transactions with at least this many confirmations.
   * @param includeWatchonly Also count watch-only addresses.
   */
  public async getBalance(minconf = 0, includeWatchonly = false): Promise<number> {
    return this.call<number>("getbalance", ["*", minconf, includeWatchonly]);
  }

  public async getWalletInfo(): Promise<WalletInfo> {
    return this.call<WalletInfo>("getwalletinfo");
  }

  public async validateAddress(address: string): Promise<AddressValidation> {
    return this.call<AddressValidation>("validateaddress", [address]);
  }

  /**
   * Creates and loads a new wallet.
   * @param walletName The wallet name, or a path where the wallet is created.
   * @example
   * await client.createWallet("savings", { passphrase: "test-secret", descriptors: true });
   */
  public async createWallet(
    walletName: string,
    {
      passphrase,
      disablePrivateKeys = false,
      blank = false,
      avoidReuse = false,
      descriptors = false,
      loadOnStartup = true,
    }: CreateWalletOptions,
  ): Promise<CreateWallet> {
    return this.call<CreateWallet>("createwallet", [
      walletName,
      disablePrivateKeys,
      blank,
      passphrase,
      avoidReuse,
      descriptors,
      loadOnStartup,
    ]);
  }

  public async loadWallet(filename: string): Promise<LoadWallet> {
    return this.call<LoadWallet>("loadwallet", [filename]);
  }

  /**
   * Unloads a wallet. Without a name, the wallet of the endpoint URL is unloaded.
   */
  public async unloadWallet(walletName?: string): Promise<UnloadWallet> {
    return this.call<UnloadWallet>("unloadwallet", walletName === undefined ? [] : [walletName]);
  }

  public async listWallets(): Promise<string[]> {
    return this.call<string[]>("listwallets");
  }

  /**
   * Unlocks an encrypted wallet.
   * @param passphrase The wallet passphrase.
   * @param timeout How long the wallet stays unlocked, in seconds.
   */
  public async walletPassphrase(passphrase: string, timeout: number): Promise<null> {
    return this.call<null>("walletpassphrase", [passphrase, timeout]);
  }

  public async walletLock(): Promise<null> {
    return this.call<null>("walletlock");
  }

  /**
   * Splits the coins of the wallet into new outputs of `amount` to maximise minting
   * yield. Only valid for continuous minting; the accumulated coin age is reset.
   * Peercoin only. An encrypted wallet must be unlocked first.
   * @param address The address that receives the new outputs.
   * @param amount The value of each new output.
   * @returns The transaction, as hex.
   */
  public async optimizeUtxoSet(
    address: string,
    amount: number,
    { transmit = false, sourceAddress = null }: OptimizeUtxoSetOptions = {},
  ): Promise<string> {
    return this.call<string>("optimizeutxoset", [address, amount, transmit, sourceAddress]);
  }

  // PSBT

  public async analyzePsbt(psbt: PSBT): Promise<AnalyzePSBT> {
    return this.call<AnalyzePSBT>("analyzepsbt", [psbt]);
  }

  /**
   * Combines several PSBTs of the same transaction into one.
   * @example
   * const combined = await client.combinePsbt(signedByAlice, signedByBob);
   */
  public async combinePsbt(...psbts: PSBT[]): Promise<CombinePSBT> {
    return this.call<CombinePSBT>("combinepsbt", [psbts]);
  }

  public async decodePsbt(psbt: PSBT): Promise<DecodePSBT> {
    return this.call<DecodePSBT>("decodepsbt", [psbt]);
  }

  /**
   * Finalizes the inputs of a PSBT.
   * @param extract Return the network transaction as hex when the PSBT is complete.
   */
  public async finalizePsbt(psbt: PSBT, extract = true): Promise<FinalizePSBT> {
    return this.call<FinalizePSBT>("finalizepsbt", [psbt, extract]);
  }

  /**
   * Joins the inputs and outputs of distinct PSBTs into a single PSBT.
   */
  public async joinPsbts(...psbts: PSBT[]): Promise<JoinPSBTs> {
    return this.call<JoinPSBTs>("joinpsbts", [psbts]);
  }

  /**
   * Adds UTXO data from the UTXO set, the mempool and the given descriptors to a PSBT.
   * The descriptors are left out of the request when none are given.
   */
  public async utxoUpdatePsbt(psbt: PSBT, descriptors?: PSBTDescriptor[]): Promise<UtxoUpdatePSBT> {
    const params = descriptors === undefined ? [psbt] : [psbt, descriptors];
    return this.call<UtxoUpdatePSBT>("utxoupdatepsbt", params);
  }

  /**
   * Updates a PSBT with wallet data and, unless `sign` is false, signs the inputs the
   * wallet can sign.
   */
  public async walletProcessPsbt(
    psbt: PSBT,
    { sign = true, sighashType = "ALL", bip32Derivs = true }: WalletProcessPsbtOptions = {},
  ): Promise<WalletProcessPSBT> {
    return this.call<WalletProcessPSBT>("walletprocesspsbt", [
      psbt,
      sign,
      sighashType,
      bip32Derivs,
    ]);
  }
}

export { CoinRPC };
export type {
  CreateWalletOptions,
  ListReceivedByAddressOptions,
  ListTransactionsOptions,
  ListUnspentOptions,
  OptimizeUtxoSetOptions,
  SendToAddressOptions,
  WalletProcessPsbtOptions,
};
