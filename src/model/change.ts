export interface ChangeRange {
  readonly base: string;
  readonly head: string;
}

export interface ChangeSet {
  /** Changed paths in the order git reports them. */
  files: string[];
  /** Raw patch text; only scanned for markers. */
  diff: string;
  /** Set when git could not be queried, in which case files and diff are empty. */
  error?: string;
}

export type ClassificationRule = 'breaking' | 'feature' | 'maintenance' | 'default';
