type MempoolInfo = {
  loaded: boolean;
  size: number;
  bytes: number;
  usage: number;
  maxmempool: number;
  mempoolminfee: number;
  minrelaytxfee: number;
  unbroadcastcount?: number;
};

/**
 * A mempool entry, as returned by `getmempoolentry` and verbose `getrawmempool`.
 */
type MempoolEntry = {
  vsize: number;
  weight: number;
  time: number;
  height: number;
  descendantcount: number;
  descendantsize: number;
  ancestorcount: number;
  ancestorsize: number;
  wtxid: string;
  fees: {
    base: number;
    modified: number;
    ancestor: number;
    descendant: number;
  };
  depends: string[];
  spentby: string[];
  "bip125-replaceable": boolean;
  unbroadcast?: boolean;
};

type MiningInfo = {
  blocks: number;
  currentblockweight?: number;
  currentblocktx?: number;
  difficulty: number | Record<string, number>;
  networkhashps: number;
  pooledtx: number;
  chain: string;
  warnings: string;
};

type NetworkInterface = {
  name: string;
  limited: boolean;
  reachable: boolean;
  proxy: string;
  proxy_randomize_credentials: boolean;
};

type LocalAddress = {
  address: string;
  port: number;
  score: number;
};

type NetworkInfo = {
  version: number;
  subversion: string;
  protocolversion: number;
  localservices: string;
  localservicesnames?: string[];
  localrelay: boolean;
  timeoffset: number;
  connections: number;
  connections_in?: number;
  connections_out?: number;
  networkactive: boolean;
  networks: NetworkInterface[];
  relayfee: number;
  incrementalfee: number;
  localaddresses: LocalAddress[];
  warnings: string;
};

type PeerInfo = {
  id: number;
  addr: string;
  addrlocal?: string;
  network?: string;
  services: string;
  relaytxes: boolean;
  lastsend: number;
  lastrecv: number;
  bytessent: number;
  bytesrecv: number;
  conntime: number;
  timeoffset: number;
  pingtime?: number;
  version: number;
  subver: string;
  inbound: boolean;
  startingheight: number;
  synced_headers: number;
  synced_blocks: number;
};

type SmartFeeEstimate = {
  feerate?: number;
  errors?: string[];
  blocks: number;
};

type EstimateMode = "UNSET" | "ECONOMICAL" | "CONSERVATIVE";

type AddressValidation = {
  isvalid: boolean;
  address?: string;
  scriptPubKey?: string;
  isscript?: boolean;
  iswitness?: boolean;
  witness_version?: number;
  witness_program?: string;
  error?: string;
};

export type {
  AddressValidation,
  EstimateMode,
  LocalAddress,
  MempoolEntry,
  MempoolInfo,
  MiningInfo,
  NetworkInfo,
  NetworkInterface,
  PeerInfo,
  SmartFeeEstimate,
};
