import { closeHttp, createApolloServer, createHttpApp, listenHttp } from "./api/server";
import { loadConfig } from "./config/env";
import { createDb, saveDb } from "./db/db";
import { DisbursementRepo } from "./db/repo";
import { EthersChainClient } from "./infrastructure/EthersChainClient";
import { IHealthProvider } from "./interfaces/IHealthProvider";
import { FaucetService } from "./services/FaucetService";
import { errorMessage } from "./shared/errors";
import { createLogger } from "./shared/logger";

const logger = createLogger("main");

/** Reports a startup failure that leaves the faucet unable to send anything. */
function fatalHealth(fatalError: string): IHealthProvider {
  return {
    healthStatus: async () => ({
      healthy: false,
      reachableChain: false,
      fundingBalanceAboveThreshold: false,
      fundingBalance: null,
      fundingAddress: null,
      queueDepth: 0,
      fatalError
    })
  };
}

async function main() {
  const config = loadConfig();

  let chain: EthersChainClient;
  try {
    chain = new EthersChainClient({ rpcUrl: config.rpcUrl, chainId: config.chainId, credential: config.credential });
  } catch (error) {
    const fatalError = `invalid-funding-credential: ${errorMessage(error)}`;
    logger.error("funding-credential-rejected", { error: errorMessage(error) });
    await listenHttp(createHttpApp({ health: fatalHealth(fatalError), faucet: null, gatewayKey: null }), config.port);
    logger.info("health-only-server-listening", { port: config.port });
    return;
  }

  const db = await createDb(config.databasePath);
  const repo = new DisbursementRepo(db);
  const databasePath = config.databasePath;
  const faucet = new FaucetService({
    chain,
    repo,
    config,
    persist: databasePath ? () => saveDb(db, databasePath) : undefined
  });
  await faucet.start();

  const apollo = createApolloServer();
  await apollo.start();
  if (config.gatewayKey === null) {
    logger.warn("gateway-key-not-configured", { disabled: ["POST /chat/commands", "mutation requestDisbursement"] });
  }
  const app = createHttpApp({
    health: faucet,
    faucet: {
      apollo,
      api: faucet,
      chat: { grantAmountWei: config.grantAmountWei, explorerTxUrl: config.explorerTxUrl }
    },
    gatewayKey: config.gatewayKey
  });
  const { server } = await listenHttp(app, config.port);
  logger.info("faucet-listening", { port: config.port, fundingAddress: chain.fundingAddress });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info("shutdown-requested", { signal });

    faucet
      .stop()
      .then(() => apollo.stop())
      .then(() => closeHttp(server))
      .then(() => chain.destroy())
      .catch((error: unknown) => {
        logger.error("shutdown-failed", { error });
        process.exitCode = 1;
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error) => {
  logger.error("faucet-process-failed", { error });
  process.exitCode = 1;
});
