/**
 * Run lifecycle
 *
 * INIT -> EXTRACTING -> TRANSFORMING -> LOADING -> DONE, with FAILED
 * reachable from every state except DONE.
 */

import { PipelineError } from '@geosync/core';
import type { PipelineState, StateTransition } from '../types/index.js';

const TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
  INIT: ['EXTRACTING', 'FAILED'],
  EXTRACTING: ['TRANSFORMING', 'FAILED'],
  TRANSFORMING: ['LOADING', 'FAILED'],
  LOADING: ['DONE', 'FAILED'],
  DONE: [],
  FAILED: [],
};

export function canTransition(from: PipelineState, to: PipelineState): boolean {
  return TRANSITIONS[from].includes(to);
}

export class RunStateMachine {
  private current: PipelineState = 'INIT';
  private readonly log: StateTransition[] = [];
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  get state(): PipelineState {
    return this.current;
  }

  get history(): readonly StateTransition[] {
    return this.log;
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  /**
   * @throws PipelineError INVALID_STATE for a transition the lifecycle does not allow
   */
  transition(to: PipelineState): StateTransition {
    if (!canTransition(this.current, to)) {
      throw new PipelineError({
        code: 'INVALID_STATE',
        message: `Illegal state transition ${this.current} -> ${to}`,
        stage: 'pipeline',
      });
    }
    const entry: StateTransition = { from: this.current, to, at: this.now() };
    this.current = to;
    this.log.push(entry);
    return entry;
  }
}
