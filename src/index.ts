import { logger } from './utils/logger';
import { config } from './config';
import { createEngine, type Engine } from './engine';
import { CosmosTransferVenue } from './ledger/cosmos-transfer-venue';
import { CosmWasmPriceOracle } from './oracle/cosmwasm-oracle';
import { disconnectClients } from './utils/blockchain';
import { startGraphQLServer } from './api/server';

let engine: Engine | null = null;
let graphQLShutdown: (() => Promise<void>) | null = null;
let shuttingDown = false;

async function run(): Promise<void> {
  logger.info('Starting stable core', {
    rpcEndpoint: config.oracle.rpcEndpoint,
    oracleAddress: config.oracle.contractAddress,
    stableAssetId: config.stable.assetId,
  });

  engine = createEngine(config, {
    oracle: new CosmWasmPriceOracle(config.oracle.contractAddress),
    venue: new CosmosTransferVenue(config.venue.assets),
  });

  const { shutdown: stopServer } = await startGraphQLServer(engine);
  graphQLShutdown = stopServer;

  engine.saga.startRecoveryPoller(config.saga.recoveryIntervalMs);
}

/**
 * Graceful shutdown
 */
async function shutdown(): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info('Shutting down stable core...');

  try {
    engine?.saga.stopRecoveryPoller();
    if (graphQLShutdown) {
      await graphQLShutdown();
    }
    await disconnectClients();
    logger.info('Shutdown complete');
  } catch (error) {
    logger.error('Error during shutdown', { error });
  }
}

function setupSignalHandlers(): void {
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGQUIT'];

  for (const signal of signals) {
    process.on(signal, () => {
      logger.info('Received shutdown signal', { signal });

      // Force exit after 30 seconds if graceful shutdown hangs
      const forceExit = setTimeout(() => {
        logger.error('Forced shutdown after timeout');
        process.exit(1);
      }, 30000);
      forceExit.unref();

      shutdown()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Shutdown failed', { error });
          process.exit(1);
        });
    });
  }

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled promise rejection', { reason });
  });

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', { error });
    setTimeout(() => process.exit(1), 1000);
  });
}

async function main(): Promise<void> {
  setupSignalHandlers();

  try {
    await run();
  } catch (error) {
    logger.error('Stable core exited with error', { error });
    await shutdown();
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.error('Fatal error', { error });
  process.exit(1);
});
