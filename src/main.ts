#!/usr/bin/env node
// Main Entry Point - Stock Analysis Workflow
// Usage: main [SYMBOL]   (defaults to AAPL; the report is written to stdout)

import { analyzeStock } from './stock-analyzer';
import { WorkflowError, describeError } from './workflow-engine';
import logger from './shared/logger';

const DEFAULT_SYMBOL = 'AAPL';

async function main(): Promise<number> {
  const symbol = (process.argv[2] ?? DEFAULT_SYMBOL).trim().toUpperCase() || DEFAULT_SYMBOL;
  const controller = new AbortController();

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.warn(`[Main] ${signal} received, cancelling analysis...`);
    controller.abort(signal);
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  logger.info(`[Main] Analysing ${symbol}`);

  try {
    const report = await analyzeStock(symbol, undefined, { signal: controller.signal });
    process.stdout.write(`${report}\n`);
    return 0;
  } catch (error) {
    if (error instanceof WorkflowError) {
      logger.error(`[Main] Analysis failed at ${error.failedNode}: ${describeError(error.cause)}`);
    } else {
      logger.error(`[Main] Analysis failed: ${describeError(error)}`);
    }
    return 1;
  } finally {
    process.off('SIGINT', shutdown);
    process.off('SIGTERM', shutdown);
  }
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error(`[Main] Unexpected error: ${describeError(error)}`);
    process.exitCode = 1;
  });
