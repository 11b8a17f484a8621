import simpleGit, { type SimpleGit } from 'simple-git';
import type { ChangeRange, ChangeSet } from '../model/change.js';
import type { ChangeSource } from './types.js';
import { describeError } from '../errors.js';

export class GitBridge implements ChangeSource {
  private git: SimpleGit;

  constructor(repoPath: string) {
    this.git = simpleGit(repoPath);
  }

  async isRepo(): Promise<boolean> {
    try {
      await this.git.revparse(['--is-inside-work-tree']);
      return true;
    } catch {
      return false;
    }
  }

  async getRepoRoot(): Promise<string> {
    const root = await this.git.revparse(['--show-toplevel']);
    return root.trim();
  }

  /**
   * Changed paths and patch text between two refs. A failing git call yields an
   * empty set with `error` filled in rather than a rejection.
   */
  async readChangeSet(range: ChangeRange): Promise<ChangeSet> {
    try {
      const nameOnly = await this.git.diff(['--name-only', range.base, range.head]);
      const files = parseNameOnly(nameOnly);
      if (files.length === 0) return { files, diff: '' };

      const diff = await this.git.diff([range.base, range.head]);
      return { files, diff };
    } catch (err) {
      return { files: [], diff: '', error: describeError(err) };
    }
  }
}

export function parseNameOnly(output: string): string[] {
  return output
    .split('\n')
    .map(line => line.trim())
    .filter(Boolean);
}
