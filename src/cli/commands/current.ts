import { GitBridge } from '../../git/bridge.js';
import { resolveConfig } from '../../config.js';
import { readBuildVersion } from '../../build-file/version-line.js';
import { formatSemVer } from '../../model/version.js';
import { exitWithError } from '../errors.js';

export interface CurrentOptions {
  cwd?: string;
  file?: string;
  format?: 'terminal' | 'json';
}

export async function currentCommand(opts: CurrentOptions = {}, env: NodeJS.ProcessEnv = process.env): Promise<void> {
  const cwd = opts.cwd ?? process.cwd();

  try {
    // Reading the build file needs no history; outside a repository the working directory is the root
    const git = new GitBridge(cwd);
    const root = (await git.isRepo()) ? await git.getRepoRoot() : cwd;
    const config = await resolveConfig({ cwd, root, env, overrides: { file: opts.file } });
    const version = formatSemVer(await readBuildVersion(config.buildFile));

    if (opts.format === 'json') {
      console.log(JSON.stringify({ file: config.buildFile, version }, null, 2));
      return;
    }
    console.log(version);
  } catch (err) {
    exitWithError(err);
  }
}
