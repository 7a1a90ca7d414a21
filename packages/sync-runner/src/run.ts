/**
 * Wires the configured components into a pipeline and runs it once
 */

import { PipelineError, wrapError } from '@geosync/core';
import { createExtractor } from '@geosync/connector-api';
import { createPostgresLoader } from '@geosync/connector-db';
import { Pipeline, Transformer, getDataset } from '@geosync/pipeline-core';
import { loadConfig, type SyncConfig } from './config.js';
import { Logger } from './logger.js';

export interface RunIO {
  /** Receives log lines and the failure description */
  stderr: (text: string) => void;
}

const defaultIO: RunIO = {
  stderr: (text) => {
    process.stderr.write(text);
  },
};

export function createPipeline(config: SyncConfig, logger: Logger): Pipeline {
  const dataset = getDataset(config.dataset);
  return new Pipeline({
    dataset,
    extractor: createExtractor(config.source, logger.child({ stage: 'extract' })),
    transformer: new Transformer(dataset),
    loader: createPostgresLoader(config.database, dataset.table, logger.child({ stage: 'load' })),
    logger,
  });
}

/**
 * Run one sync from the given environment.
 * Resolves to the process exit code; never rejects.
 */
export async function runSync(env: NodeJS.ProcessEnv, io: RunIO = defaultIO): Promise<number> {
  let config: SyncConfig;
  try {
    config = loadConfig(env);
  } catch (err) {
    io.stderr(`${wrapError(err, 'config').toActionableMessage()}\n`);
    return 1;
  }

  const logger = new Logger({ ...config.logging, write: io.stderr }).child({ dataset: config.dataset });

  try {
    logger.info('Starting sync', { table: getDataset(config.dataset).table.name });
    const report = await createPipeline(config, logger).run();
    logger.info(`Sync complete: ${report.loaded} records loaded`, {
      extracted: report.extracted,
      rejected: report.rejected,
      skipped: report.skipped,
      durationMs: report.durationMs,
    });
    return 0;
  } catch (err) {
    const error = err instanceof PipelineError ? err : wrapError(err, 'pipeline');
    logger.error('Sync failed', { code: error.code, stage: error.stage });
    io.stderr(`${error.toActionableMessage()}\n`);
    return 1;
  }
}
