import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import type { TlsPolicy } from '../vsphere/types.js';

export const DEFAULT_STARTER_FILE = 'vconnect_starter.txt';

export class ConfigError extends Error {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.name = 'ConfigError';
    this.field = field;
  }
}

export interface StarterConfig {
  host: string;
  username: string;
  tlsPolicy: TlsPolicy;
}

export interface ConfigOverrides {
  host?: string;
  username?: string;
  verifyTls?: boolean;
}

/**
 * Parses `key="value"` lines. Quotes are optional, `#` starts a comment
 * line, keys are case-insensitive.
 */
export function parseStarterFile(content: string): Map<string, string> {
  const values = new Map<string, string>();

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) {
      continue;
    }
    const eq = line.indexOf('=');
    if (eq <= 0) {
      continue;
    }
    const key = line.slice(0, eq).trim().toLowerCase();
    let value = line.slice(eq + 1).trim();
    const quoted = value.match(/^"([^"]*)"|^'([^']*)'/);
    if (quoted) {
      value = quoted[1] ?? quoted[2] ?? '';
    }
    values.set(key, value);
  }

  return values;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * `https://vc.example.com/` and `vc.example.com` both become `vc.example.com`.
 */
export function normalizeHost(host: string): string {
  return host.trim().replace(/^https?:\/\//i, '').replace(/\/+$/, '');
}

/**
 * Resolves the connection settings. CLI overrides beat the environment
 * (`VCENTER_HOST`, `VCENTER_USER`, `VCENTER_VERIFY_TLS`), which beats the
 * starter file. A missing file is fine as long as host and user come from
 * elsewhere.
 */
export async function loadStarterConfig(
  path: string = DEFAULT_STARTER_FILE,
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): Promise<StarterConfig> {
  const file = existsSync(path) ? parseStarterFile(await readFile(path, 'utf-8')) : new Map<string, string>();

  const host = overrides.host || env.VCENTER_HOST || file.get('host');
  if (!host) {
    throw new ConfigError(`No vCenter host configured (set host= in ${path}, VCENTER_HOST or --host)`, 'host');
  }

  const username = overrides.username || env.VCENTER_USER || file.get('user');
  if (!username) {
    throw new ConfigError(`No vCenter user configured (set user= in ${path}, VCENTER_USER or --user)`, 'user');
  }

  const verifyTls =
    overrides.verifyTls ?? parseBoolean(env.VCENTER_VERIFY_TLS) ?? parseBoolean(file.get('verify_tls')) ?? false;

  return {
    host: normalizeHost(host),
    username,
    tlsPolicy: verifyTls ? 'verify' : 'insecure',
  };
}
