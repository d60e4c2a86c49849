import { loadStarterConfig, type StarterConfig } from '../config/starter.js';
import type { Output } from '../ui/output.js';
import type { Prompter } from '../ui/prompt.js';
import { describeError } from '../utils/describeError.js';
import { connect } from '../vsphere/client.js';
import { AuthenticationError } from '../vsphere/errors.js';
import type { VCenterSession } from '../vsphere/types.js';

/**
 * Options shared by every command that talks to vCenter.
 */
export interface SessionOptions {
  configPath: string;
  host?: string;
  user?: string;
  verifyTls?: boolean;
  pollIntervalMs: number;
  verbose: boolean;
}

export interface OpenedSession {
  config: StarterConfig;
  session: VCenterSession;
}

/**
 * Reads the starter config, asks for the password and logs in. Failures are
 * reported here and come back as null with a non-zero exit code set.
 */
export async function openSession(options: SessionOptions, prompt: Prompter, out: Output): Promise<OpenedSession | null> {
  out.line(`Reading configuration from ${options.configPath}...`);

  let config: StarterConfig;
  try {
    config = await loadStarterConfig(options.configPath, {
      host: options.host,
      username: options.user,
      verifyTls: options.verifyTls,
    });
  } catch (error) {
    out.error(`❌ ${describeError(error)}`);
    process.exitCode = 1;
    return null;
  }

  out.line(`vCenter Host: ${config.host}`);
  out.line(`Username: ${config.username}`);
  if (config.tlsPolicy === 'insecure') {
    out.warn('⚠️  TLS certificate verification is disabled (use --verify-tls to enable it)');
  }

  const password = await prompt.askSecret(`\nEnter password for ${config.username}: `);

  out.line('Connecting to vCenter...');
  try {
    const session = await connect({
      host: config.host,
      username: config.username,
      password,
      tlsPolicy: config.tlsPolicy,
      pollIntervalMs: options.pollIntervalMs,
      trace: (line) => out.debug(line),
    });
    return { config, session };
  } catch (error) {
    if (error instanceof AuthenticationError) {
      out.error(`❌ ${error.message}`);
    } else {
      out.error(`❌ Could not connect to vCenter at ${config.host}: ${describeError(error)}`);
    }
    process.exitCode = 1;
    return null;
  }
}

/**
 * Logs out, reporting rather than throwing when that fails.
 */
export async function closeSession(session: VCenterSession, out: Output): Promise<void> {
  out.line('Disconnecting...');
  try {
    await session.disconnect();
    out.line('Goodbye!');
  } catch (error) {
    out.warn(`⚠️  Logout failed: ${describeError(error)}`);
  }
}
