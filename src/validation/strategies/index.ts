import type { ValidatorStrategy } from '../types.js';
import { CursorValidator } from './cursor.js';
import { GenericValidator } from './generic.js';
import { GitHubValidator } from './github.js';
import { replitValidator, tabnineValidator, warpValidator } from './program-page.js';

/** Built-in strategies in registration order. */
export function createDefaultStrategies(): ValidatorStrategy[] {
  return [
    new CursorValidator(),
    new GitHubValidator(),
    replitValidator(),
    warpValidator(),
    tabnineValidator(),
    new GenericValidator(),
  ];
}

export { CursorValidator, GenericValidator, GitHubValidator };
export { ProgramPageValidator } from './program-page.js';
