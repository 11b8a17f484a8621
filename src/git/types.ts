import type { ChangeRange, ChangeSet } from '../model/change.js';

/** Anything that can report what changed between two refs. */
export interface ChangeSource {
  readChangeSet(range: ChangeRange): Promise<ChangeSet>;
}
