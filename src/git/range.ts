import type { ChangeRange } from '../model/change.js';
import type { RunConfig } from '../config.js';
import { ConfigError } from '../errors.js';

export const PUSH_RANGE: ChangeRange = { base: 'HEAD~1', head: 'HEAD' };

export function resolveChangeRange(config: Pick<RunConfig, 'event' | 'baseRef' | 'headRef'>): ChangeRange {
  if (config.event === 'push') return PUSH_RANGE;

  if (!config.baseRef || !config.headRef) {
    throw new ConfigError('Pull request runs need both a base and a head ref');
  }
  return { base: config.baseRef, head: config.headRef };
}
