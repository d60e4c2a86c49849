import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError, loadStarterConfig, normalizeHost, parseStarterFile } from './starter.js';

describe('parseStarterFile', () => {
  it('reads quoted and bare values and skips comments', () => {
    const values = parseStarterFile('# lab vCenter\nHOST="vc.lab.local"\r\nuser=\'admin@vsphere.local\'\nverify_tls = true\n\nnot a setting\n');

    expect([...values]).toEqual([
      ['host', 'vc.lab.local'],
      ['user', 'admin@vsphere.local'],
      ['verify_tls', 'true'],
    ]);
  });
});

describe('normalizeHost', () => {
  it('drops the scheme and trailing slashes', () => {
    expect(normalizeHost(' https://vc.lab.local/ ')).toBe('vc.lab.local');
    expect(normalizeHost('vc.lab.local')).toBe('vc.lab.local');
  });
});

describe('loadStarterConfig', () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'vconsole-'));
    path = join(dir, 'vconnect_starter.txt');
    await writeFile(path, 'host="vc.lab.local"\nuser="admin@vsphere.local"\n');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads host and user from the file with TLS verification off', async () => {
    expect(await loadStarterConfig(path, {}, {})).toEqual({
      host: 'vc.lab.local',
      username: 'admin@vsphere.local',
      tlsPolicy: 'insecure',
    });
  });

  it('lets the environment override the file and flags override both', async () => {
    const env = { VCENTER_HOST: 'vc2.lab.local', VCENTER_USER: 'ops@vsphere.local', VCENTER_VERIFY_TLS: 'true' };

    expect(await loadStarterConfig(path, {}, env)).toEqual({
      host: 'vc2.lab.local',
      username: 'ops@vsphere.local',
      tlsPolicy: 'verify',
    });
    expect(await loadStarterConfig(path, { host: 'vc3.lab.local', verifyTls: false }, env)).toEqual({
      host: 'vc3.lab.local',
      username: 'ops@vsphere.local',
      tlsPolicy: 'insecure',
    });
  });

  it('works without a file when everything comes from elsewhere', async () => {
    const missing = join(dir, 'absent.txt');

    expect(await loadStarterConfig(missing, { host: 'vc.lab.local', username: 'admin' }, {})).toEqual({
      host: 'vc.lab.local',
      username: 'admin',
      tlsPolicy: 'insecure',
    });
  });

  it('names the missing setting', async () => {
    const missing = join(dir, 'absent.txt');

    const error = await loadStarterConfig(missing, {}, {}).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ field: 'host' });

    await expect(loadStarterConfig(missing, { host: 'vc.lab.local' }, {})).rejects.toThrow(
      `No vCenter user configured (set user= in ${missing}, VCENTER_USER or --user)`
    );
  });
});
