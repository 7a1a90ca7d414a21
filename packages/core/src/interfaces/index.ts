export type { IExtractor, ILoader } from './stages.js';
export type { StageLogger } from './logger.js';
export { silentLogger } from './logger.js';
