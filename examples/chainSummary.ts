import "dotenv/config";
import { createCoinRPCFromEnv, logger, withCoinRPC } from "../src/index.js";

const summary = await withCoinRPC(createCoinRPCFromEnv(), async (client) => {
  const info = await client.getBlockchainInfo();
  const tip = await client.getBlock(info.bestblockhash);
  const mempool = await client.getMempoolInfo();

  return {
    chain: info.chain,
    height: info.blocks,
    tip: tip.hash,
    tipTransactions: tip.nTx,
    mempoolSize: mempool.size,
  };
});

logger.info(summary, "chain summary");
