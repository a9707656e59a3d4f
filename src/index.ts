#!/usr/bin/env node
import { config } from './config.js';
import { openStore } from './db/store.js';
import { runEtl } from './etl/orchestrator.js';
import { loadRunConfig, type RunConfig } from './etl/run-config.js';
import { createLogger, fallbackLogger, logFilePath } from './utils/logger.js';

async function main(): Promise<void> {
  const startedAt = new Date();
  const logger = createLogger({
    level: config.LOG_LEVEL,
    logDir: config.LOG_DIR,
    pretty: config.LOG_PRETTY,
    startedAt,
  });
  logger.info({ logFile: logFilePath(config.LOG_DIR, startedAt) }, 'Logging initialized');

  const configPath = process.argv[2] ?? config.ETL_CONFIG_PATH;
  let runConfig: RunConfig;
  try {
    runConfig = loadRunConfig(configPath, config.FOOTBALL_DATA_TOKEN);
  } catch (err) {
    logger.fatal(err, 'Failed to load configuration');
    process.exitCode = 1;
    return;
  }

  logger.info(
    { configPath, store: runConfig.database.type, requestsPerMin: runConfig.etl.requestsPerMin },
    'Starting football ETL...',
  );

  const report = await runEtl(runConfig, { openStore, log: logger });
  logger.info({ report }, `ETL finished: ${report.state}`);
  process.exitCode = report.state === 'failed' ? 1 : 0;
}

main().catch((err: unknown) => {
  fallbackLogger().fatal(err, 'ETL crashed');
  process.exitCode = 1;
});
