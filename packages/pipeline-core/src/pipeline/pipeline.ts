/**
 * Pipeline
 *
 * Drives one sync run: extract, transform, then load inside a single
 * connection. Every failure ends the run in FAILED and is re-raised as a
 * PipelineError.
 */

import {
  silentLogger,
  wrapError,
  type IExtractor,
  type ILoader,
  type LoadResult,
  type PipelineError,
  type PipelineStage,
  type RawRecord,
  type StageLogger,
} from '@geosync/core';
import type { Dataset, ITransformer, PipelineState, RunReport, TransformReport } from '../types/index.js';
import { RunStateMachine } from './state-machine.js';

/** Rejections logged individually before only the count is reported */
export const MAX_LOGGED_REJECTIONS = 20;

export interface PipelineOptions {
  dataset: Dataset;
  extractor: IExtractor;
  transformer: ITransformer;
  loader: ILoader;
  logger?: StageLogger;
  now?: () => number;
}

const STAGE_OF: Record<PipelineState, PipelineStage> = {
  INIT: 'pipeline',
  EXTRACTING: 'extract',
  TRANSFORMING: 'transform',
  LOADING: 'load',
  DONE: 'pipeline',
  FAILED: 'pipeline',
};

export class Pipeline {
  private readonly options: PipelineOptions;
  private readonly logger: StageLogger;
  private readonly now: () => number;
  private readonly machine: RunStateMachine;

  constructor(options: PipelineOptions) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
    this.machine = new RunStateMachine(this.now);
  }

  get state(): PipelineState {
    return this.machine.state;
  }

  /**
   * Execute the run. A Pipeline runs once; build a new one per run.
   * @throws PipelineError from the failing stage
   */
  async run(): Promise<RunReport> {
    const startedAt = this.now();

    try {
      this.enter('EXTRACTING');
      const raw = await this.options.extractor.extract();
      this.logger.info('Extract complete', { records: raw.length });

      this.enter('TRANSFORMING');
      const report = this.transform(raw);

      this.enter('LOADING');
      const loaded = await this.load(report);

      this.enter('DONE');
      return {
        state: 'DONE',
        dataset: this.options.dataset.name,
        table: this.options.dataset.table.name,
        extracted: raw.length,
        transformed: report.records.length,
        rejected: report.rejected.length,
        loaded: loaded.inserted,
        skipped: loaded.attempted - loaded.inserted,
        durationMs: this.now() - startedAt,
      };
    } catch (error) {
      throw this.fail(error);
    }
  }

  private enter(state: PipelineState): void {
    const { from, to } = this.machine.transition(state);
    this.logger.debug('State transition', { from, to });
  }

  private transform(raw: RawRecord[]): TransformReport {
    const report = this.options.transformer.transform(raw);

    for (const { index, error } of report.rejected.slice(0, MAX_LOGGED_REJECTIONS)) {
      this.logger.warn('Rejected record', { index, field: error.field, reason: error.message });
    }
    const unlogged = report.rejected.length - MAX_LOGGED_REJECTIONS;
    if (unlogged > 0) {
      this.logger.warn('Further rejected records not logged individually', { count: unlogged });
    }

    this.logger.info('Transform complete', {
      accepted: report.records.length,
      rejected: report.rejected.length,
    });
    return report;
  }

  private async load(report: TransformReport): Promise<LoadResult> {
    const { loader } = this.options;
    let result: LoadResult;

    try {
      await loader.connect();
      result = await loader.load(report.records);
    } catch (error) {
      await this.closeLoader();
      throw error;
    }

    // The load has committed; a failed close no longer changes the outcome
    await this.closeLoader();
    this.logger.info('Load complete', { inserted: result.inserted, attempted: result.attempted });
    return result;
  }

  private async closeLoader(): Promise<void> {
    try {
      await this.options.loader.close();
    } catch (closeError) {
      this.logger.warn('Failed to close database connection', {
        error: closeError instanceof Error ? closeError.message : String(closeError),
      });
    }
  }

  private fail(error: unknown): PipelineError {
    const state = this.machine.state;
    const wrapped = wrapError(error, STAGE_OF[state]);
    if (!this.machine.isTerminal) {
      this.machine.transition('FAILED');
      this.logger.debug('State transition', { from: state, to: 'FAILED' });
    }
    return wrapped;
  }
}
