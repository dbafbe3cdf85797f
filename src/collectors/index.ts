import type { PipelineConfig } from '../env.js';
import { CursorCollector } from './cursor.js';
import { GenericCollector } from './generic.js';
import { GitHubCollector } from './github.js';
import { ReplitCollector } from './replit.js';
import { TabnineCollector, WarpCollector } from './student-program.js';
import type { SourceCollector } from './types.js';

/**
 * Built-in collectors in registration order. The runner concatenates
 * their results in this order.
 */
export function createDefaultCollectors(
  config: Pick<PipelineConfig, 'genericSourceUrls'>,
): SourceCollector[] {
  return [
    new CursorCollector(),
    new GitHubCollector(),
    new ReplitCollector(),
    new WarpCollector(),
    new TabnineCollector(),
    new GenericCollector({ urls: config.genericSourceUrls }),
  ];
}

export { CursorCollector, GenericCollector, GitHubCollector, ReplitCollector, TabnineCollector, WarpCollector };
export type { CollectorOptions, SourceCollector } from './types.js';
