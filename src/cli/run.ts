import path from 'node:path';

import type { Command } from 'commander';

import { createLLMClient, createOracle, loadLLMConfig } from '../llm/index.js';
import type { LLMClient, LLMConfig } from '../llm/index.js';
import { launchBrowser } from '../browser/index.js';
import { AutomationSession } from '../core/session.js';
import { LocatorCache, createFileStore, createMemoryStore } from '../core/cache.js';
import { describeStep, dispatch, reportsContent } from '../core/operations.js';
import { loadOptionalConfigFile, loadScriptFile } from '../config/loader.js';
import { PATHS } from '../config/defaults.js';
import { looksFailed } from '../schema/index.js';
import type { FileConfig, Script } from '../schema/index.js';
import * as log from '../utils/logger.js';

// ── Shared options ───────────────────────────────────────────

interface SessionOptions {
  config: string;
  headless?: true;
  profile?: string;
  /** False when --no-cache is given. */
  cache: boolean;
}

function withSessionOptions(command: Command): Command {
  return command
    .option('--config <path>', 'Path to config file', PATHS.CONFIG_FILE)
    .option('--headless', 'Run browser headless')
    .option('--profile <dir>', 'Persistent browser profile directory')
    .option('--no-cache', 'Keep the selector cache in memory only');
}

class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function message(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ── Session assembly ─────────────────────────────────────────

async function buildSession(opts: SessionOptions): Promise<AutomationSession> {
  let config: FileConfig;
  let llmConfig: LLMConfig;
  try {
    config = await loadOptionalConfigFile(opts.config);
    const envConfig = loadLLMConfig();
    const model = config.model ?? envConfig.model;
    llmConfig = {
      provider: config.provider ?? envConfig.provider,
      ...(envConfig.apiKey !== undefined ? { apiKey: envConfig.apiKey } : {}),
      ...(model !== undefined ? { model } : {}),
      ...(envConfig.baseUrl !== undefined ? { baseUrl: envConfig.baseUrl } : {}),
      ...(envConfig.timeoutMs !== undefined ? { timeoutMs: envConfig.timeoutMs } : {}),
    };
  } catch (err) {
    throw new ConfigError(message(err));
  }

  let client: LLMClient;
  try {
    client = createLLMClient(llmConfig);
  } catch (err) {
    throw new ConfigError(message(err));
  }

  const store = opts.cache && config.cache.persistent
    ? createFileStore(path.resolve(config.cache.path))
    : createMemoryStore();
  const cache = await LocatorCache.open(store);

  const headless = opts.headless ?? config.headless;
  const profileDir = opts.profile ?? config.profileDir;

  return new AutomationSession({
    launch: () => launchBrowser({ headless, profileDir }),
    oracle: createOracle(client),
    cache,
    screenshotDir: config.screenshotDir,
    catalogLimit: config.catalogLimit,
    minConfidence: config.minConfidence,
    ...(config.settleAfterActionMs !== undefined
      ? { settleAfterActionMs: config.settleAfterActionMs }
      : {}),
  });
}

function reportFatal(err: unknown): void {
  if (err instanceof ConfigError) {
    process.stderr.write(`Config error: ${err.message}\n`);
    process.exitCode = 4;
    return;
  }
  process.stderr.write(`Error: ${message(err)}\n`);
  process.exitCode = 1;
}

// ── Script execution ─────────────────────────────────────────

/**
 * Run every step in order, printing each result to stdout.
 * Returns the number of steps whose result reads as a failure.
 */
export async function runScript(session: AutomationSession, script: Script): Promise<number> {
  let failures = 0;

  const opened = await session.open();
  if (looksFailed(opened)) {
    process.stdout.write(opened + '\n');
    return 1;
  }

  try {
    const navigated = await session.goTo(script.url);
    process.stdout.write(navigated + '\n');
    if (looksFailed(navigated)) return 1;

    for (const [i, step] of script.steps.entries()) {
      log.section(`Step ${String(i + 1)}: ${describeStep(step)}`);
      const result = await dispatch(session, step);
      process.stdout.write(result + '\n');

      if (!reportsContent(step) && looksFailed(result)) failures++;
    }
  } finally {
    await session.close();
  }

  return failures;
}

// ── Command registration ─────────────────────────────────────

export function registerFindCommand(program: Command): void {
  withSessionOptions(
    program
      .command('find')
      .description('Resolve a natural-language description to a locator')
      .argument('<url>', 'Page to open')
      .argument('<description>', 'What to look for, e.g. "the login button"'),
  ).action(async (url: string, description: string, opts: SessionOptions) => {
    try {
      const session = await buildSession(opts);
      const opened = await session.open();
      if (looksFailed(opened)) {
        process.stdout.write(opened + '\n');
        process.exitCode = 1;
        return;
      }

      try {
        const navigated = await session.goTo(url);
        const result = looksFailed(navigated)
          ? navigated
          : await session.findElement(description);
        process.stdout.write(result + '\n');
        if (looksFailed(result)) process.exitCode = 1;
      } finally {
        await session.close();
      }
    } catch (err) {
      reportFatal(err);
    }
  });
}

export function registerRunCommand(program: Command): void {
  withSessionOptions(
    program
      .command('run')
      .description('Run a YAML or JSON step script')
      .argument('<script>', 'Path to the script file'),
  ).action(async (scriptPath: string, opts: SessionOptions) => {
    let script: Script;
    try {
      script = await loadScriptFile(scriptPath);
    } catch (err) {
      reportFatal(new ConfigError(`${scriptPath}: ${message(err)}`));
      return;
    }

    try {
      const session = await buildSession(opts);
      const failures = await runScript(session, script);
      if (failures > 0) {
        log.warn(`${String(failures)} step(s) failed`);
        process.exitCode = 1;
      }
    } catch (err) {
      reportFatal(err);
    }
  });
}
