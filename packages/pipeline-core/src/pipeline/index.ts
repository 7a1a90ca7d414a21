export { Pipeline, MAX_LOGGED_REJECTIONS } from './pipeline.js';
export type { PipelineOptions } from './pipeline.js';
export { RunStateMachine, canTransition } from './state-machine.js';
