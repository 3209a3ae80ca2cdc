import { createCoinRPC, logger, withCoinRPC } from "../src/index.js";

const client = createCoinRPC("http://127.0.0.1:9904", "user", "test-secret", { timeout: 12 });

await withCoinRPC(client, async (rpc) => {
  const [utxo] = await rpc.listUnspent({ minconf: 1 });
  if (!utxo) {
    throw new Error("No spendable outputs in the wallet");
  }

  const address = await rpc.getNewAddress("change");
  const raw = await rpc.createRawTransaction(
    [{ txid: utxo.txid, vout: utxo.vout }],
    [{ [address]: utxo.amount - 0.01 }],
  );
  const signed = await rpc.signRawTransactionWithWallet(raw);
  const [accepted] = await rpc.testMempoolAccept([signed.hex]);

  logger.info({ txid: accepted?.txid, allowed: accepted?.allowed }, "mempool check");
});
