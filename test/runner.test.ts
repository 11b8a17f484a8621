import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { run } from '../src/runner.js';
import { createDefaultRules } from '../src/classify/rules.js';
import { ChangeSetError, VersionReadError } from '../src/errors.js';
import type { RunConfig } from '../src/config.js';
import type { ChangeRange, ChangeSet } from '../src/model/change.js';
import type { ChangeSource } from '../src/git/types.js';
import type { Logger } from '../src/utils/log.js';

class FakeSource implements ChangeSource {
  readonly requested: ChangeRange[] = [];

  constructor(private readonly changeSet: ChangeSet) {}

  async readChangeSet(range: ChangeRange): Promise<ChangeSet> {
    this.requested.push(range);
    return this.changeSet;
  }
}

function recordingLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    log: message => lines.push(`log ${message}`),
    info: message => lines.push(`info ${message}`),
    warn: message => lines.push(`warn ${message}`),
    detail: message => lines.push(`detail ${message}`),
  };
}

describe('run', () => {
  let dir: string;
  let buildFile: string;
  let infoFile: string;

  const config = (overrides: Partial<RunConfig> = {}): RunConfig => ({
    cwd: dir,
    event: 'push',
    buildFile,
    infoFile,
    strict: false,
    dryRun: false,
    rules: createDefaultRules(),
    ...overrides,
  });

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'verbump-run-'));
    buildFile = join(dir, 'build.gradle');
    infoFile = join(dir, '.version_info');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('bumps MINOR for a feature and writes the status file', async () => {
    writeFileSync(buildFile, "group 'com.example'\nversion '1.2.3'\n");
    const source = new FakeSource({ files: ['Foo.java'], diff: '+ feat: add bar' });

    const outcome = await run(config(), source);

    expect(source.requested).toEqual([{ base: 'HEAD~1', head: 'HEAD' }]);
    expect(outcome.status).toBe('bumped');
    expect(readFileSync(buildFile, 'utf-8')).toBe("group 'com.example'\nversion '1.3.0'\n");
    expect(readFileSync(infoFile, 'utf-8')).toBe(
      'VERSION_TYPE=MINOR\nOLD_VERSION=1.2.3\nNEW_VERSION=1.3.0\nCHANGES_DETECTED=true\nPR_DETECTED=false\n',
    );
  });

  it('bumps MAJOR for a breaking marker in a pull request', async () => {
    writeFileSync(buildFile, 'version "1.3.0"\n');
    const source = new FakeSource({ files: ['build.gradle'], diff: 'fix!: critical' });

    const outcome = await run(config({ event: 'pull_request', baseRef: 'main', headRef: 'topic' }), source);

    expect(source.requested).toEqual([{ base: 'main', head: 'topic' }]);
    expect(readFileSync(buildFile, 'utf-8')).toBe("version '2.0.0'\n");
    expect(readFileSync(infoFile, 'utf-8')).toBe(
      'VERSION_TYPE=MAJOR\nOLD_VERSION=1.3.0\nNEW_VERSION=2.0.0\nCHANGES_DETECTED=true\nPR_DETECTED=true\n',
    );
    if (outcome.status !== 'bumped') throw new Error('expected a bump');
    expect(outcome.classification.rule).toBe('breaking');
    expect(outcome.written).toBe(true);
  });

  it('bumps a build file with CRLF endings', async () => {
    writeFileSync(buildFile, "group 'com.example'\r\nversion '2.4.1'\r\n");

    const outcome = await run(config(), new FakeSource({ files: ['src/Foo.java'], diff: 'fix: null check' }));

    if (outcome.status !== 'bumped') throw new Error('expected a bump');
    expect(outcome.record.oldVersion).toBe('2.4.1');
    expect(outcome.record.newVersion).toBe('2.4.2');
    expect(readFileSync(buildFile, 'utf-8')).toBe("group 'com.example'\r\nversion '2.4.2'\r\n");
  });

  it('defaults to PATCH when no marker matches', async () => {
    writeFileSync(buildFile, "version '1.0.0'\n");

    const outcome = await run(config(), new FakeSource({ files: ['README.md'], diff: 'updated readme' }));

    if (outcome.status !== 'bumped') throw new Error('expected a bump');
    expect(outcome.record.versionType).toBe('PATCH');
    expect(outcome.classification.rule).toBe('default');
    expect(readFileSync(buildFile, 'utf-8')).toBe("version '1.0.1'\n");
  });

  it('does nothing when no files changed', async () => {
    writeFileSync(buildFile, "version '1.0.0'\n");
    const logger = recordingLogger();

    const outcome = await run(config(), new FakeSource({ files: [], diff: '' }), logger);

    expect(outcome).toEqual({ status: 'unchanged', range: { base: 'HEAD~1', head: 'HEAD' }, reason: 'no-files' });
    expect(readFileSync(buildFile, 'utf-8')).toBe("version '1.0.0'\n");
    expect(existsSync(infoFile)).toBe(false);
    expect(logger.lines).toContain('warn No modified files found');
  });

  it('treats a git failure as no changes by default', async () => {
    writeFileSync(buildFile, "version '1.0.0'\n");
    const logger = recordingLogger();

    const outcome = await run(config(), new FakeSource({ files: [], diff: '', error: 'bad revision' }), logger);

    expect(outcome).toEqual({ status: 'unchanged', range: { base: 'HEAD~1', head: 'HEAD' }, reason: 'git-error' });
    expect(existsSync(infoFile)).toBe(false);
    expect(logger.lines).toContain('warn Could not determine changes (bad revision); treating as no modified files');
  });

  it('fails on a git failure in strict mode', async () => {
    writeFileSync(buildFile, "version '1.0.0'\n");

    await expect(
      run(config({ strict: true }), new FakeSource({ files: [], diff: '', error: 'bad revision' })),
    ).rejects.toThrow(new ChangeSetError('Could not determine changes between HEAD~1 and HEAD: bad revision'));
    expect(existsSync(infoFile)).toBe(false);
  });

  it('fails before writing when the version line is missing', async () => {
    writeFileSync(buildFile, "group 'com.example'\n");

    await expect(run(config(), new FakeSource({ files: ['Foo.java'], diff: 'fix: x' }))).rejects.toBeInstanceOf(
      VersionReadError,
    );
    expect(readFileSync(buildFile, 'utf-8')).toBe("group 'com.example'\n");
    expect(existsSync(infoFile)).toBe(false);
  });

  it('writes nothing on a dry run', async () => {
    writeFileSync(buildFile, "version '0.4.2'\n");

    const outcome = await run(config({ dryRun: true }), new FakeSource({ files: ['app.yaml'], diff: 'new: setting' }));

    if (outcome.status !== 'bumped') throw new Error('expected a bump');
    expect(outcome.written).toBe(false);
    expect(outcome.record.newVersion).toBe('0.5.0');
    expect(readFileSync(buildFile, 'utf-8')).toBe("version '0.4.2'\n");
    expect(existsSync(infoFile)).toBe(false);
  });

  it('logs the change summary', async () => {
    writeFileSync(buildFile, "version '1.0.0'\n");
    const logger = recordingLogger();

    await run(config(), new FakeSource({ files: ['a.md', 'b.txt'], diff: 'docs: tidy' }), logger);

    expect(logger.lines).toContain('log PATCH changes detected (fixes and improvements)');
    expect(logger.lines).toContain('detail Modified files: 2');
    expect(logger.lines).toContain('log Version updated successfully: 1.0.0 → 1.0.1');
    expect(logger.lines).toContain('log Direct push detected - preparing commit for new version');
  });
});
