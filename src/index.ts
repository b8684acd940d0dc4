import type { Server } from 'http';
import { config } from './config.js';
import { RpcChainReader } from './chainReader.js';
import { ConnectionMonitor } from './connectionMonitor.js';
import { CopyTrader } from './copyTrader.js';
import { SqliteMonitorRepository, closeDatabase, persistTransactionLogs } from './database.js';
import { errorMessage } from './errors.js';
import { EventBus } from './eventBus.js';
import { FeedConnectionManager } from './feedConnection.js';
import { PriceStore } from './priceStore.js';
import { PumpFunApi } from './pumpFunApi.js';
import { RedisRelay } from './redisRelay.js';
import { createServer, startServer } from './server.js';
import { PaperTradeExecutor } from './tradeExecutor.js';
import { TradeResolver } from './tradeResolver.js';
import { VaultPriceMonitor, loadPoolConfigs } from './vaultPriceMonitor.js';
import { GrpcWalletClient } from './walletClient.js';
import { WalletMonitor } from './walletMonitor.js';

/**
 * Main entry point for the copy-trade monitor
 */
async function main(): Promise<void> {
  console.log('🔧 Validating configuration...');
  config.validate();

  const bus = new EventBus();
  const connectionMonitor = new ConnectionMonitor(bus);
  const priceStore = new PriceStore();
  priceStore.attach(bus);

  // Relay first: settings and wallet changes from siblings must not be missed
  console.log('📡 Connecting to Redis...');
  const relay = new RedisRelay(config.redisUrl, bus, connectionMonitor);
  await relay.connect();
  await relay.subscribeToUpdates();
  relay.forwardLocalEvents();

  const repository = new SqliteMonitorRepository();
  const stopPersisting = persistTransactionLogs(bus, repository);

  const reader = new RpcChainReader(config.solanaRpcHttpUrl);
  const walletClient = new GrpcWalletClient(config.walletServiceUrl, {
    protoPath: config.walletServiceProtoPath,
    timeoutMs: config.walletServiceTimeoutMs,
    connectionMonitor,
  });
  const copyTrader = new CopyTrader({
    bus,
    walletService: walletClient,
    executor: new PaperTradeExecutor(),
    userId: config.serverWalletAddress,
  });

  const monitor = await WalletMonitor.create({
    bus,
    repository,
    createFeed: () => new FeedConnectionManager(config.solanaRpcWsUrl, {}, { connectionMonitor }),
    tradeSource: new TradeResolver(reader, new PumpFunApi(config.pumpFunApiUrl)),
    copyTrader,
    userId: config.serverWalletAddress,
  });

  let vaultMonitor: VaultPriceMonitor | null = null;
  if (config.priceFeedPoolsFile) {
    const pools = loadPoolConfigs(config.priceFeedPoolsFile);
    vaultMonitor = new VaultPriceMonitor(reader, bus, priceStore, pools, config.vaultPollIntervalMs);
    vaultMonitor.start();
  }

  let server: Server | null = null;
  if (config.statusApiEnabled) {
    server = await startServer(createServer({ monitor, priceStore, connectionMonitor, relay }));
  }

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`\n🛑 ${signal} received, shutting down...`);

    await monitor.stop();
    vaultMonitor?.stop();
    stopPersisting();
    server?.close();
    walletClient.close();
    await relay.close();
    closeDatabase();
    console.log('👋 Shutdown complete');
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch(error => {
          console.error(`❌ Error during shutdown: ${errorMessage(error)}`);
          process.exit(1);
        });
    });
  }

  console.log(`\n${'='.repeat(60)}`);
  console.log('✅ MONITOR STARTED');
  console.log(`${'='.repeat(60)}`);
  console.log(`   User: ${config.serverWalletAddress}`);
  console.log(`   Tracked wallets: ${monitor.getStatus().trackedWallets} (${monitor.getStatus().activeWallets} active)`);
  console.log(`   Vault pools: ${vaultMonitor ? 'polling' : 'disabled'}`);
  console.log(`${'='.repeat(60)}\n`);

  // Resolves on stop; rejects when a monitor task dies, which ends the process
  await monitor.start();
}

main().catch(error => {
  console.error(`❌ Fatal error: ${errorMessage(error)}`);
  process.exit(1);
});
