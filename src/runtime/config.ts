/**
 * Configuration loader for marq.
 *
 * Loads marq.config.json from the working directory or a specified path.
 * Provides module search paths, engine settings and predefined variables.
 */

import * as fs from 'fs';
import * as path from 'path';

export interface MarqConfig {
  /** Directories searched for `include`/`import` modules, in order. */
  searchPaths?: string[];
  maxCallStackDepth?: number;
  /** false selects the tree-walking evaluator. */
  useCompiler?: boolean;
  trace?: boolean;
  /** String variables bound in the root environment before evaluation. */
  defines?: Record<string, string>;
}

export const CONFIG_FILENAMES = ['marq.config.json', '.marqrc.json'];

/**
 * Load marq configuration from the filesystem.
 *
 * Search order:
 * 1. Explicit path (if provided)
 * 2. marq.config.json in cwd
 * 3. .marqrc.json in cwd
 *
 * Returns empty config if no file is found (not an error).
 */
export function loadConfig(explicitPath?: string): MarqConfig {
  if (explicitPath) {
    return readConfigFile(explicitPath);
  }

  const cwd = process.cwd();

  for (const filename of CONFIG_FILENAMES) {
    const filePath = path.join(cwd, filename);
    if (fs.existsSync(filePath)) {
      return readConfigFile(filePath);
    }
  }

  return {};
}

/**
 * Load config relative to a query file's directory, falling back to cwd.
 * Useful when running `marq -f path/to/query.marq` from a different cwd.
 */
export function loadConfigForScript(scriptPath: string): MarqConfig {
  const scriptDir = path.dirname(path.resolve(scriptPath));

  for (const filename of CONFIG_FILENAMES) {
    const filePath = path.join(scriptDir, filename);
    if (fs.existsSync(filePath)) {
      return readConfigFile(filePath);
    }
  }

  return loadConfig();
}

function readConfigFile(filePath: string): MarqConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file ${filePath}: ${error.message}`);
    }
    throw error;
  }
  return validateConfig(parsed, filePath);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate config structure. Throws on invalid config.
 */
export function validateConfig(raw: unknown, filePath: string): MarqConfig {
  if (!isRecord(raw)) {
    throw new Error(`Invalid config in ${filePath}: must be an object`);
  }

  const config: MarqConfig = {};
  const { searchPaths, maxCallStackDepth, useCompiler, trace, defines } = raw;

  if (searchPaths !== undefined) {
    if (!Array.isArray(searchPaths) || !searchPaths.every((p): p is string => typeof p === 'string')) {
      throw new Error(`Invalid "searchPaths" in ${filePath}: must be an array of strings`);
    }
    config.searchPaths = searchPaths;
  }

  if (maxCallStackDepth !== undefined) {
    if (typeof maxCallStackDepth !== 'number' || !Number.isInteger(maxCallStackDepth) || maxCallStackDepth < 1) {
      throw new Error(`Invalid "maxCallStackDepth" in ${filePath}: must be a positive integer`);
    }
    config.maxCallStackDepth = maxCallStackDepth;
  }

  if (useCompiler !== undefined) {
    if (typeof useCompiler !== 'boolean') {
      throw new Error(`Invalid "useCompiler" in ${filePath}: must be a boolean`);
    }
    config.useCompiler = useCompiler;
  }

  if (trace !== undefined) {
    if (typeof trace !== 'boolean') {
      throw new Error(`Invalid "trace" in ${filePath}: must be a boolean`);
    }
    config.trace = trace;
  }

  if (defines !== undefined) {
    if (!isRecord(defines)) {
      throw new Error(`Invalid "defines" in ${filePath}: must be an object`);
    }
    const out: Record<string, string> = {};
    for (const [name, value] of Object.entries(defines)) {
      if (typeof value !== 'string') {
        throw new Error(`Invalid define "${name}" in ${filePath}: must be a string`);
      }
      out[name] = value;
    }
    config.defines = out;
  }

  return config;
}
