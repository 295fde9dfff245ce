import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { fileConfigSchema } from '../schema/config.js';
import type { FileConfig } from '../schema/config.js';
import { scriptSchema } from '../schema/script.js';
import type { Script } from '../schema/script.js';

// ── File parsing ────────────────────────────────────────────

async function readStructured(filePath: string): Promise<unknown> {
  const raw = await readFile(filePath, 'utf-8');

  return filePath.endsWith('.json')
    ? JSON.parse(raw)
    : parseYaml(raw);
}

function isMissingFile(err: unknown): boolean {
  return (
    err instanceof Error &&
    'code' in err &&
    err.code === 'ENOENT'
  );
}

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a `.wayfind.yaml` (or JSON) config file.
 * Throws a descriptive error if the file is missing or invalid.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  const parsed = await readStructured(configPath);
  return fileConfigSchema.parse(parsed ?? {});
}

/**
 * Same as `loadConfigFile`, but a missing file yields the schema
 * defaults. An existing file that fails validation still throws.
 */
export async function loadOptionalConfigFile(configPath: string): Promise<FileConfig> {
  try {
    return await loadConfigFile(configPath);
  } catch (err) {
    if (isMissingFile(err)) {
      return fileConfigSchema.parse({});
    }
    throw err;
  }
}

/** Load a step script for the `run` command. */
export async function loadScriptFile(scriptPath: string): Promise<Script> {
  const parsed = await readStructured(scriptPath);
  return scriptSchema.parse(parsed);
}
