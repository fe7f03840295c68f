#!/usr/bin/env node
import { playwrightSessionOpener } from './browser/session.js';
import { loadConfig } from './config.js';
import { FileFeedStore } from './feed/store.js';
import { runFeedPipeline } from './pipeline/run.js';
import { RunLogger, dailyLogPath } from './utils/logger.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = new RunLogger(dailyLogPath(config.logDir), { label: `${config.orgName} feed run`, echo: true });
  await logger.init();

  try {
    const outcome = await runFeedPipeline({
      config,
      openSession: playwrightSessionOpener(config.browser),
      store: new FileFeedStore(logger),
      logger,
    });
    if (outcome.state === 'noop') {
      await logger.info(`No new jobs; ${outcome.outputPath} unchanged (${outcome.scrapedCount} scraped).`);
    } else {
      await logger.info(`Published ${outcome.writtenCount} jobs to ${outcome.outputPath}.`);
    }
  } catch (error) {
    await logger.error(`Feed run failed: ${String(error)}`);
    throw error;
  } finally {
    await logger.close();
  }
}

main().catch((error) => {
  console.error(`Feed run failed: ${String(error)}`);
  process.exitCode = 1;
});
