import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { applyRuleOverrides, createDefaultRules, type RuleTable } from './classify/rules.js';
import { ConfigError, describeError } from './errors.js';

export type EventKind = 'pull_request' | 'push';

export interface RunConfig {
  cwd: string;
  event: EventKind;
  baseRef?: string;
  headRef?: string;
  /** Absolute path of the file holding the `version '<X.Y.Z>'` line. */
  buildFile: string;
  /** Absolute path of the KEY=value status file. */
  infoFile: string;
  /** Fail instead of treating an unreadable diff as "nothing changed". */
  strict: boolean;
  /** Classify and compute, but write nothing. */
  dryRun: boolean;
  rules: RuleTable;
}

export const DEFAULT_BUILD_FILE = 'build.gradle';
export const DEFAULT_INFO_FILE = '.version_info';
export const CONFIG_FILE_NAMES = ['.verbumprc.json', '.verbumprc'];

export interface EnvConfig {
  event: EventKind;
  baseRef?: string;
  headRef?: string;
}

/** Read the GitHub Actions event variables. Nothing else in the project touches the environment. */
export function configFromEnv(env: NodeJS.ProcessEnv): EnvConfig {
  if (env.GITHUB_EVENT_NAME !== 'pull_request') {
    return { event: 'push' };
  }
  return {
    event: 'pull_request',
    baseRef: env.GITHUB_BASE_REF || undefined,
    headRef: env.GITHUB_HEAD_REF || undefined,
  };
}

const ruleOverrideSchema = z
  .object({
    filePatterns: z.array(z.string().min(1)).optional(),
    markers: z.array(z.string().min(1)).optional(),
    ignoreCase: z.boolean().optional(),
  })
  .strict();

const configFileSchema = z
  .object({
    buildFile: z.string().min(1).optional(),
    infoFile: z.string().min(1).optional(),
    rules: z
      .object({
        breaking: ruleOverrideSchema.optional(),
        feature: ruleOverrideSchema.optional(),
        maintenance: ruleOverrideSchema.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof configFileSchema>;

export async function loadConfigFile(root: string): Promise<FileConfig> {
  const configFile = CONFIG_FILE_NAMES.map(name => resolve(root, name)).find(path => existsSync(path));
  if (!configFile) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(configFile, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Could not parse ${configFile}: ${describeError(err)}`);
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid ${configFile}: ${issues.join('; ')}`);
  }
  return parsed.data;
}

export interface CliOverrides {
  event?: EventKind;
  base?: string;
  head?: string;
  file?: string;
  infoFile?: string;
  strict?: boolean;
  dryRun?: boolean;
}

export interface ResolveConfigOptions {
  cwd: string;
  /** Repository root: where the rc file is looked up and what its paths are relative to. Defaults to `cwd`. */
  root?: string;
  env: NodeJS.ProcessEnv;
  overrides?: CliOverrides;
}

/** Defaults, then the rc file, then the environment, then CLI flags. */
export async function resolveConfig(opts: ResolveConfigOptions): Promise<RunConfig> {
  const overrides = opts.overrides ?? {};
  const root = opts.root ?? opts.cwd;
  const fileConfig = await loadConfigFile(root);
  const envConfig = configFromEnv(opts.env);

  let rules: RuleTable;
  try {
    rules = applyRuleOverrides(createDefaultRules(), fileConfig.rules ?? {});
  } catch (err) {
    throw new ConfigError(`Invalid rule pattern: ${describeError(err)}`);
  }

  const event = overrides.event ?? envConfig.event;
  const baseRef = overrides.base ?? (event === envConfig.event ? envConfig.baseRef : undefined);
  const headRef = overrides.head ?? (event === envConfig.event ? envConfig.headRef : undefined);

  return {
    cwd: opts.cwd,
    event,
    baseRef,
    headRef,
    // Flags are relative to the working directory, everything else to the root
    buildFile: overrides.file ? resolve(opts.cwd, overrides.file) : resolve(root, fileConfig.buildFile ?? DEFAULT_BUILD_FILE),
    infoFile: overrides.infoFile ? resolve(opts.cwd, overrides.infoFile) : resolve(root, fileConfig.infoFile ?? DEFAULT_INFO_FILE),
    strict: overrides.strict ?? false,
    dryRun: overrides.dryRun ?? false,
    rules,
  };
}

export function parseEventKind(value: string): EventKind {
  if (value === 'pull_request' || value === 'push') return value;
  throw new ConfigError(`Unknown event "${value}" (expected pull_request or push)`);
}
