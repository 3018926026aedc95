import { existsSync, readFileSync } from 'node:fs';
import dotenv from 'dotenv';
import { DevstrapError, ErrorCode } from '../lib/errors.js';
import { debug } from '../lib/utils/debug.js';

export type CredentialSource = 'env' | 'file';

export interface CredentialEntry {
  key: string;
  source: CredentialSource;
  value: string;
}

const ASSIGNMENT = /^\s*(?:export\s+)?[A-Za-z_][A-Za-z0-9_]*\s*=/;

/**
 * Parse a `.env` file with dotenv. Every non-blank, non-comment line must be a
 * `KEY=VALUE` assignment; dotenv itself drops malformed lines silently.
 * Throws DevstrapError(CREDENTIAL_FILE_INVALID) naming the first bad line.
 */
export function parseEnvFile(content: string, filePath = '.env'): Map<string, string> {
  const lines = content.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i]!.trim();
    if (line === '' || line.startsWith('#')) continue;
    if (!ASSIGNMENT.test(line)) {
      throw new DevstrapError(
        ErrorCode.CREDENTIAL_FILE_INVALID,
        `${filePath}:${i + 1}: expected KEY=VALUE`,
        'Each non-comment line must look like GITHUB_PAT=value',
      );
    }
  }

  return new Map(Object.entries(dotenv.parse(content)));
}

export interface CredentialResolverOptions {
  env?: NodeJS.ProcessEnv;
  /** Entries read from the credential file, if one was found */
  fileEntries?: Map<string, string>;
}

/**
 * Resolves named secrets: process environment first, then the credential file.
 * Empty values count as absent. Never writes anything.
 */
export class CredentialResolver {
  private readonly env: NodeJS.ProcessEnv;
  private readonly fileEntries: Map<string, string>;

  constructor(options: CredentialResolverOptions = {}) {
    this.env = options.env ?? process.env;
    this.fileEntries = options.fileEntries ?? new Map();
  }

  /**
   * Build a resolver backed by an optional `.env`-style file.
   * A missing file is not an error; a malformed one is.
   */
  static fromEnvFile(filePath: string, env: NodeJS.ProcessEnv = process.env): CredentialResolver {
    if (!existsSync(filePath)) {
      debug('credentials', `no credential file at ${filePath}`);
      return new CredentialResolver({ env });
    }
    const fileEntries = parseEnvFile(readFileSync(filePath, 'utf-8'), filePath);
    debug('credentials', `loaded ${fileEntries.size} entries from ${filePath}`);
    return new CredentialResolver({ env, fileEntries });
  }

  resolve(key: string): CredentialEntry | null {
    const fromEnv = this.env[key];
    if (fromEnv) return { key, source: 'env', value: fromEnv };

    const fromFile = this.fileEntries.get(key);
    if (fromFile) return { key, source: 'file', value: fromFile };

    debug('credentials', `credential ${key} not configured`);
    return null;
  }

  has(key: string): boolean {
    return this.resolve(key) !== null;
  }
}
