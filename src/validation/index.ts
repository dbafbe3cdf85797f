export { ValidationDispatcher } from './dispatcher.js';
export { createDefaultStrategies, CursorValidator, GenericValidator, GitHubValidator, ProgramPageValidator } from './strategies/index.js';
export type { ValidatorStrategy } from './types.js';
