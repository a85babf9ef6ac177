/**
 * CLI configuration loading
 *
 * Loads configuration from .env files, searching from the current directory
 * up to the filesystem root.
 */

import { isLogLevel, type Environment, type LogLevel } from '@dirconf/logger';
import * as fs from 'node:fs';
import * as path from 'node:path';

export interface DirconfConfig {
  logLevel?: LogLevel;
  environment?: Environment;
  indent?: string;
}

const ENVIRONMENTS: readonly Environment[] = ['test', 'development', 'production'];

/**
 * Parse a .env file into a key-value object
 */
export function parseEnvFile(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) {
      continue;
    }

    const key = trimmed.slice(0, eqIndex).trim();
    let value = trimmed.slice(eqIndex + 1).trim();

    // Remove surrounding quotes if present
    if (
      value.length >= 2 &&
      ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'")))
    ) {
      value = value.slice(1, -1);
    }

    result[key] = value;
  }

  return result;
}

/**
 * Find and load the nearest .env file, searching from startDir up to root
 */
function findEnvFile(startDir: string): Record<string, string> | null {
  let currentDir = path.resolve(startDir);

  while (true) {
    const envPath = path.join(currentDir, '.env');

    if (fs.existsSync(envPath) && fs.statSync(envPath).isFile()) {
      return parseEnvFile(fs.readFileSync(envPath, 'utf-8'));
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached filesystem root
      break;
    }
    currentDir = parentDir;
  }

  return null;
}

/**
 * Indentation from its configured form: a number of spaces, or `tab`
 */
export function parseIndent(value: string): string {
  if (value === 'tab') {
    return '\t';
  }
  if (/^\d+$/.test(value) && Number(value) <= 16) {
    return ' '.repeat(Number(value));
  }
  throw new Error(`Invalid indent '${value}': expected a number of spaces (0-16) or 'tab'`);
}

function applyVariables(config: DirconfConfig, variables: Record<string, string | undefined>): void {
  const logLevel = variables.DIRCONF_LOG_LEVEL;
  if (logLevel) {
    if (!isLogLevel(logLevel)) {
      throw new Error(`Invalid DIRCONF_LOG_LEVEL '${logLevel}'`);
    }
    config.logLevel = logLevel;
  }

  const environment = variables.DIRCONF_ENV;
  if (environment) {
    const known = ENVIRONMENTS.find((candidate) => candidate === environment);
    if (!known) {
      throw new Error(`Invalid DIRCONF_ENV '${environment}'`);
    }
    config.environment = known;
  }

  const indent = variables.DIRCONF_INDENT;
  if (indent) {
    config.indent = parseIndent(indent);
  }
}

/**
 * Load dirconf configuration from environment and .env files
 *
 * Priority (highest to lowest):
 * 1. Process environment variables
 * 2. .env file (searched from cwd upward)
 */
export function loadConfig(
  cwd: string = process.cwd(),
  env: Record<string, string | undefined> = process.env,
): DirconfConfig {
  const config: DirconfConfig = {};

  // Load from .env file first (lower priority)
  const envFile = findEnvFile(cwd);
  if (envFile) {
    applyVariables(config, envFile);
  }

  // Override with process environment (higher priority)
  applyVariables(config, env);

  return config;
}
