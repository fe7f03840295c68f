import type { OpenSession } from '../browser/session.js';
import type { FeedConfig } from '../config.js';
import { channelFromConfig } from '../config.js';
import { extractJobs } from '../extract/extractor.js';
import { buildFeed } from '../feed/builder.js';
import { filterNewJobs } from '../feed/dedup.js';
import type { FeedStore } from '../feed/store.js';
import type { ExtractionReport, PipelineOutcome, PipelineState } from '../types.js';
import type { Logger } from '../utils/logger.js';

export interface PipelineDeps {
  config: FeedConfig;
  openSession: OpenSession;
  store: FeedStore;
  logger: Logger;
  now?: () => Date;
}

function emptyReport(): ExtractionReport {
  return { strategy: null, candidateCount: 0, jobs: [], rejections: [] };
}

async function enter(logger: Logger, state: PipelineState, detail?: string): Promise<void> {
  await logger.info(detail ? `state=${state} ${detail}` : `state=${state}`);
}

async function scrapeJobs(deps: PipelineDeps): Promise<ExtractionReport> {
  const { config, logger } = deps;
  // Launch failures propagate; everything after launch degrades to an empty job list.
  const session = await deps.openSession();
  try {
    await enter(logger, 'fetch', `url=${config.careersUrl}`);
    const html = await session.fetchRenderedHtml(config.careersUrl);

    await enter(logger, 'extract', `html_bytes=${html.length}`);
    const report = extractJobs(html, {
      orgName: config.orgName,
      baseDomain: config.baseDomain,
      relativeLinkBase: config.relativeLinkBase,
      defaultLocation: config.defaultLocation,
      locationHints: config.locationHints,
      maxCandidates: config.maxCandidates,
    });

    await logger.info(`strategy=${report.strategy ?? 'none'} candidates=${report.candidateCount}`);
    for (const rejection of report.rejections) {
      const message = `candidate ${rejection.index} skipped: ${rejection.reason}`;
      if (rejection.reason === 'error') {
        await logger.warn(`${message} ${rejection.detail ?? ''}`.trim());
      } else {
        await logger.info(message);
      }
    }
    for (const job of report.jobs) {
      await logger.info(`[OK] ${job.title}`);
    }
    return report;
  } catch (error) {
    await logger.warn(`Scraping failed, continuing with no jobs: ${String(error)}`);
    return emptyReport();
  } finally {
    await session.close();
  }
}

export async function runFeedPipeline(deps: PipelineDeps): Promise<PipelineOutcome> {
  const { config, store, logger } = deps;
  const now = deps.now ?? (() => new Date());

  await enter(logger, 'read-previous', `path=${config.outputPath}`);
  const previousExists = await store.exists(config.outputPath);
  const known = previousExists ? await store.readKnownLinks(config.outputPath) : new Set<string>();
  await logger.info(`previous_feed=${String(previousExists)} known_links=${known.size}`);

  const report = await scrapeJobs(deps);

  await enter(logger, 'deduplicate', `scraped=${report.jobs.length}`);
  const fresh = filterNewJobs(report.jobs, known);
  await logger.info(`new_jobs=${fresh.length} already_published=${report.jobs.length - fresh.length}`);

  await enter(logger, 'decide');
  if (fresh.length === 0 && previousExists) {
    await enter(logger, 'noop', 'no new jobs, existing feed left untouched');
    return {
      state: 'noop',
      scrapedCount: report.jobs.length,
      freshCount: 0,
      writtenCount: 0,
      outputPath: config.outputPath,
    };
  }

  // The written feed holds only this run's new jobs, not the union with earlier items.
  await enter(logger, 'build-and-persist', `items=${fresh.length}`);
  const document = buildFeed(fresh, channelFromConfig(config), now());
  await store.writeFeed(config.outputPath, document);
  await logger.info(`Feed written to ${config.outputPath}`);

  return {
    state: 'built',
    scrapedCount: report.jobs.length,
    freshCount: fresh.length,
    writtenCount: fresh.length,
    outputPath: config.outputPath,
  };
}
