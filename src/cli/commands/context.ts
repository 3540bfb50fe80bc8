import type { LexLocator } from '../../api/lexlocator.js';

export interface CommandContext {
  locator: LexLocator;
  /** Arguments after the command name. */
  args: string[];
}
