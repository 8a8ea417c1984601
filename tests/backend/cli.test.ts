import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { defaultOutputPath } from '@/commands/generate';
import { main } from '@/commands';
import { FakeIosTransport } from './helpers/fakeIos';

const R1 = `
device:
  hostname: r1
  ip_address: 10.0.0.1
  device_type: cisco_ios
  credentials:
    username: admin
    password: test-password
    enable_secret: test-secret
interfaces:
  - name: Gi0/0
    description: Uplink
    status: up
    ip_address: 10.0.0.2
    subnet_mask: 255.255.255.0
`;

const R1_CONFIG =
  '! Generated Configuration\n! Device: r1\n!\nhostname r1\n\ninterface Gi0/0\n description Uplink\n no shutdown\n ip address 10.0.0.2 255.255.255.0\n!\n\n\n\nend';

const BROKEN = `
device:
  ip_address: 10.0.0.300
interfaces: []
`;

describe('defaultOutputPath', () => {
  it('swaps the YAML extension for .cfg', () => {
    expect(defaultOutputPath('devices/r1.yaml')).toBe('devices/r1.cfg');
    expect(defaultOutputPath('devices/r1.YML')).toBe('devices/r1.cfg');
    expect(defaultOutputPath('devices/r1')).toBe('devices/r1.cfg');
  });

  it('places the file in the output directory', () => {
    expect(defaultOutputPath('devices/r1.yaml', 'build')).toBe(path.join('build', 'r1.cfg'));
  });
});

describe('netcfg CLI', () => {
  let tmpDir: string;
  let log: MockInstance<typeof console.log>;

  const printed = () => log.mock.calls.map(call => call.join(' '));

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'netcfg-cli-'));
    await fs.writeFile(path.join(tmpDir, 'r1.yaml'), R1);
    await fs.writeFile(path.join(tmpDir, 'broken.yaml'), BROKEN);
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe('generate', () => {
    it('writes the configuration beside the device file and prints it', async () => {
      const input = path.join(tmpDir, 'r1.yaml');

      const code = await main(['generate', input], { env: {} });

      expect(code).toBe(0);
      expect(await fs.readFile(path.join(tmpDir, 'r1.cfg'), 'utf-8')).toBe(R1_CONFIG);
      expect(printed()).toEqual(['\n--- Generated Configuration ---', R1_CONFIG]);
    });

    it('honours --output and --quiet', async () => {
      const output = path.join(tmpDir, 'out', 'router.cfg');

      const code = await main(['generate', path.join(tmpDir, 'r1.yaml'), '-o', output, '--quiet'], { env: {} });

      expect(code).toBe(0);
      expect(await fs.readFile(output, 'utf-8')).toBe(R1_CONFIG);
      expect(printed()).toEqual([]);
    });

    it('writes several files into --out-dir', async () => {
      const outDir = path.join(tmpDir, 'build');

      const code = await main(
        ['generate', path.join(tmpDir, 'r1.yaml'), path.join(tmpDir, 'broken.yaml'), '--out-dir', outDir, '-q'],
        { env: {} },
      );

      expect(code).toBe(0);
      expect((await fs.readdir(outDir)).sort()).toEqual(['broken.cfg', 'r1.cfg']);
    });

    it('refuses --output with more than one file', async () => {
      const code = await main(
        ['generate', path.join(tmpDir, 'r1.yaml'), path.join(tmpDir, 'broken.yaml'), '-o', 'x.cfg'],
        { env: {} },
      );

      expect(code).toBe(2);
    });

    it('fails for a missing device file', async () => {
      expect(await main(['generate', path.join(tmpDir, 'missing.yaml')], { env: {} })).toBe(1);
    });
  });

  describe('validate', () => {
    it('passes a valid device', async () => {
      const input = path.join(tmpDir, 'r1.yaml');

      expect(await main(['validate', input], { env: {} })).toBe(0);
      expect(printed()).toEqual([
        `\n=== Validation Results for ${input} ===\n\n✓ Validation PASSED: Configuration is valid`,
      ]);
    });

    it('fails when any file has errors', async () => {
      const code = await main(['validate', path.join(tmpDir, 'r1.yaml'), path.join(tmpDir, 'broken.yaml')], { env: {} });

      expect(code).toBe(1);
      expect(printed()[1]).toContain('✗ Validation FAILED: 2 error(s) found');
    });
  });

  describe('deploy', () => {
    const files = () => [path.join(tmpDir, 'r1.yaml'), path.join(tmpDir, 'r1.cfg')];

    beforeEach(async () => {
      await fs.writeFile(path.join(tmpDir, 'r1.cfg'), R1_CONFIG);
    });

    it('connects but sends nothing on a dry run', async () => {
      const transport = new FakeIosTransport({ enableSecret: 'test-secret' });

      const code = await main(['deploy', ...files(), '--dry-run'], { env: {}, transport });

      expect(code).toBe(0);
      expect(transport.lastChannel?.received).toEqual(['terminal length 0', 'show version']);
      expect(printed()).toEqual([
        '\n[DRY RUN] Would deploy the following configuration:',
        '-'.repeat(50),
        R1_CONFIG,
        '-'.repeat(50),
      ]);
    });

    it('deploys and prints the device output', async () => {
      const transport = new FakeIosTransport({ enableSecret: 'test-secret' });

      const code = await main(['deploy', ...files()], { env: {}, transport });

      expect(code).toBe(0);
      expect(transport.lastChannel?.received).toContain('write memory');
      expect(printed()[0]).toBe('\nDevice output:');
    });

    it('takes credentials from the environment first', async () => {
      const transport = new FakeIosTransport({ enableSecret: 'test-secret' });
      const env = { NETWORK_USERNAME: 'ops', NETWORK_PASSWORD: 'env-password', NETCFG_SSH_PORT: '2222' };

      await main(['deploy', ...files(), '--dry-run'], { env, transport });

      expect(transport.connections).toEqual([
        { deviceType: 'cisco_ios', host: '10.0.0.1', port: 2222, username: 'ops', password: 'env-password', secret: 'test-secret' },
      ]);
    });

    it('refuses an invalid device unless validation is skipped', async () => {
      const transport = new FakeIosTransport();
      const broken = [path.join(tmpDir, 'broken.yaml'), path.join(tmpDir, 'r1.cfg')];

      expect(await main(['deploy', ...broken], { env: {}, transport })).toBe(1);
      expect(transport.connections).toEqual([]);

      // Passes validation gate, then fails for lack of credentials
      expect(await main(['deploy', ...broken, '--skip-validation'], { env: {}, transport })).toBe(1);
      expect(transport.connections).toEqual([]);
    });

    it('returns 1 when the device rejects the enable secret', async () => {
      const transport = new FakeIosTransport({ enableSecret: 'test-secret' });

      const code = await main(['deploy', ...files()], { env: { NETWORK_ENABLE_PASSWORD: 'wrong-secret' }, transport });

      expect(code).toBe(1);
    });

    it('needs both files', async () => {
      expect(await main(['deploy', path.join(tmpDir, 'r1.yaml')], { env: {} })).toBe(2);
    });
  });

  it('prints usage for help', async () => {
    expect(await main(['help'], { env: {} })).toBe(0);
    expect(printed()[0]).toContain('Usage:');
  });

  it('returns 2 for unknown commands, missing commands and unknown flags', async () => {
    expect(await main(['frobnicate'], { env: {} })).toBe(2);
    expect(await main([], { env: {} })).toBe(2);
    expect(await main(['validate', path.join(tmpDir, 'r1.yaml'), '--bogus'], { env: {} })).toBe(2);
  });
});
