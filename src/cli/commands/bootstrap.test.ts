import { existsSync, mkdtempSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { Mock } from 'vitest';
import type { ArtifactSpec } from '@domain/types/fixture.js';
import type { LaunchPlan } from '@domain/types/launch-plan.js';
import { setLoggerOptions } from '@shared/lib/logger.js';
import { createProgram } from '@cli/program.js';

const PROGRAM_ID = 'TestProgram1111111111111111111111111111111';
const ACCOUNT_ID = 'TestAccount1111111111111111111111111111111';

function writeConfig(dir: string, extra: Record<string, unknown> = {}): void {
  writeFileSync(join(dir, 'localnet.config.json'), JSON.stringify({
    cluster: 'l',
    fixtures: [
      { identity: PROGRAM_ID, fileName: 'test-program.so', method: 'program-dump', label: 'Test program' },
      { identity: ACCOUNT_ID, fileName: 'test-account.json', method: 'account-snapshot', label: 'Test account' },
    ],
    ...extra,
  }));
}

describe('bootstrap commands', () => {
  let dir: string;
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;
  let fetcher: { fetch: Mock<(spec: ArtifactSpec) => Promise<void>> };
  let launcher: { launch: Mock<(plan: LaunchPlan, onSpawn?: () => void) => Promise<number>> };
  let checkBinary: Mock<(binary: string) => Promise<boolean>>;

  async function run(...args: string[]): Promise<void> {
    const program = createProgram({ fetcher, launcher, checkBinary });
    program.exitOverride();
    await program.parseAsync(['node', 'localnet', '--cwd', dir, ...args]);
  }

  function lastLog(): unknown {
    return logSpy.mock.calls.at(-1)?.[0];
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'localnet-bootstrap-cmd-test-'));
    writeConfig(dir);
    vi.stubEnv('PROGRAMS_DIR', '');
    vi.stubEnv('ACCOUNTS_DIR', '');
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    fetcher = {
      fetch: vi.fn(async (spec: ArtifactSpec) => {
        writeFileSync(spec.targetPath, `fixture for ${spec.identity}`);
      }),
    };
    launcher = {
      launch: vi.fn(async (_plan: LaunchPlan, onSpawn?: () => void) => {
        onSpawn?.();
        return 0;
      }),
    };
    checkBinary = vi.fn(async (_binary: string) => true);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    logSpy.mockRestore();
    errorSpy.mockRestore();
    vi.unstubAllEnvs();
    setLoggerOptions({});
    process.exitCode = undefined;
  });

  describe('start', () => {
    it('provisions fixtures and launches the validator with passthrough arguments last', async () => {
      await run('start', '--limit-ledger-size', '50');

      expect(fetcher.fetch).toHaveBeenCalledTimes(2);
      expect(launcher.launch).toHaveBeenCalledTimes(1);
      expect(launcher.launch.mock.calls[0]?.[0].args).toEqual([
        '--reset',
        '--bpf-program', PROGRAM_ID, join(dir, 'programs', 'test-program.so'),
        '--account', ACCOUNT_ID, join(dir, 'accounts', 'test-account.json'),
        '--limit-ledger-size', '50',
      ]);
      expect(process.exitCode).toBe(0);
    });

    it('is the default command', async () => {
      await run('--limit-ledger-size', '50');

      expect(launcher.launch.mock.calls[0]?.[0].passthrough).toEqual(['--limit-ledger-size', '50']);
    });

    it('forwards everything after -- even when it matches a localnet option', async () => {
      await run('--', '--json', '--rpc-port', '8999');

      expect(launcher.launch.mock.calls[0]?.[0].passthrough).toEqual(['--json', '--rpc-port', '8999']);
    });

    it('drops the separator after validator options so both forms forward the same tokens', async () => {
      await run('start', '--limit-ledger-size', '50', '--', '--json');
      await run('--', '--limit-ledger-size', '50', '--json');

      const [first, second] = launcher.launch.mock.calls;
      expect(first?.[0].passthrough).toEqual(['--limit-ledger-size', '50', '--json']);
      expect(second?.[0].passthrough).toEqual(['--limit-ledger-size', '50', '--json']);
    });

    it('narrates progress on stdout', async () => {
      await run('start');

      const lines = logSpy.mock.calls.map(([line]) => String(line));
      expect(lines).toContain('Created directory: ./programs');
      expect(lines).toContain('Downloading Test program...');
      expect(lines.some((line) => line.includes('Starting solana-test-validator...'))).toBe(true);
    });

    it('mirrors the validator exit code', async () => {
      launcher.launch.mockResolvedValueOnce(3);

      await run('start');

      expect(process.exitCode).toBe(3);
    });

    it('uses cached files on the second run', async () => {
      await run('start');
      await run('start');

      expect(fetcher.fetch).toHaveBeenCalledTimes(2);
      expect(launcher.launch).toHaveBeenCalledTimes(2);
      expect(launcher.launch.mock.calls[1]?.[0].args).toEqual(launcher.launch.mock.calls[0]?.[0].args);
    });

    it('does not launch when a fetch fails', async () => {
      fetcher.fetch.mockRejectedValueOnce(new Error('rpc unavailable'));

      await run('start');

      expect(launcher.launch).not.toHaveBeenCalled();
      expect(process.exitCode).toBe(1);
      expect(errorSpy).toHaveBeenCalledWith(
        `Error: Failed to fetch ${PROGRAM_ID} into ${join(dir, 'programs', 'test-program.so')}: rpc unavailable. ` +
          `If a partial file was left at ${join(dir, 'programs', 'test-program.so')}, remove it before retrying.`,
      );
    });

    it('stops with no side effects when the CLI tools are missing', async () => {
      checkBinary.mockResolvedValue(false);

      await run('start');

      expect(process.exitCode).toBe(1);
      expect(errorSpy).toHaveBeenCalledWith(
        'Error: Required CLI tools not found on PATH: solana, solana-test-validator. ' +
          'Install the Solana CLI tool suite and make sure it is on your PATH.',
      );
      expect(fetcher.fetch).not.toHaveBeenCalled();
      expect(existsSync(join(dir, 'programs'))).toBe(false);
    });

    it('checks the binary names from the config file before touching the filesystem', async () => {
      writeConfig(dir, { solanaBinary: 'solana-2.1', validatorBinary: 'validator-2.1' });
      checkBinary.mockResolvedValue(false);

      await run('start');

      expect(checkBinary.mock.calls).toEqual([['solana-2.1'], ['validator-2.1']]);
      expect(errorSpy.mock.calls[0]?.[0]).toContain('not found on PATH: solana-2.1, validator-2.1.');
      expect(readdirSync(dir)).toEqual(['localnet.config.json']);
    });

    it('refuses to run outside a localnet working directory', async () => {
      const empty = mkdtempSync(join(tmpdir(), 'localnet-empty-test-'));
      try {
        const program = createProgram({ fetcher, launcher, checkBinary });
        program.exitOverride();
        await program.parseAsync(['node', 'localnet', '--cwd', empty, 'start']);

        expect(process.exitCode).toBe(1);
        expect(errorSpy.mock.calls[0]?.[0]).toContain(`No localnet.config.json found in ${empty}`);
        expect(readdirSync(empty)).toEqual([]);
        expect(checkBinary).not.toHaveBeenCalled();
      } finally {
        rmSync(empty, { recursive: true, force: true });
      }
    });
  });

  describe('provision', () => {
    it('fetches without launching and prints a summary', async () => {
      await run('provision');

      expect(launcher.launch).not.toHaveBeenCalled();
      expect(checkBinary.mock.calls).toEqual([['solana']]);
      expect(lastLog()).toBe([
        'Provisioned 2 fixture(s): 2 fetched, 0 cached',
        '  fetched Test program',
        `          ${join(dir, 'programs', 'test-program.so')}`,
        '  fetched Test account',
        `          ${join(dir, 'accounts', 'test-account.json')}`,
      ].join('\n'));
    });

    it('reports cached fixtures as JSON on a second run', async () => {
      await run('provision');
      logSpy.mockClear();

      await run('--json', 'provision');

      expect(fetcher.fetch).toHaveBeenCalledTimes(2);
      expect(logSpy).toHaveBeenCalledTimes(1);
      expect(JSON.parse(String(lastLog()))).toEqual([
        { identity: PROGRAM_ID, method: 'program-dump', path: join(dir, 'programs', 'test-program.so'), status: 'cached' },
        { identity: ACCOUNT_ID, method: 'account-snapshot', path: join(dir, 'accounts', 'test-account.json'), status: 'cached' },
      ]);
    });

    it('reads target directories from the environment', async () => {
      vi.stubEnv('PROGRAMS_DIR', 'env-programs');

      await run('provision');

      expect(existsSync(join(dir, 'env-programs', 'test-program.so'))).toBe(true);
    });
  });

  describe('plan', () => {
    it('prints the launch plan as JSON without launching', async () => {
      await run('--json', 'plan', '--limit-ledger-size', '50');

      expect(launcher.launch).not.toHaveBeenCalled();
      expect(JSON.parse(String(lastLog()))).toEqual({
        command: 'solana-test-validator',
        args: [
          '--reset',
          '--bpf-program', PROGRAM_ID, join(dir, 'programs', 'test-program.so'),
          '--account', ACCOUNT_ID, join(dir, 'accounts', 'test-account.json'),
          '--limit-ledger-size', '50',
        ],
      });
    });

    it('lets --programs-dir win over PROGRAMS_DIR', async () => {
      vi.stubEnv('PROGRAMS_DIR', 'env-programs');

      await run('--json', 'plan', '--programs-dir', 'flag-programs');

      const plan: unknown = JSON.parse(String(lastLog()));
      expect(plan).toMatchObject({
        args: expect.arrayContaining([join(dir, 'flag-programs', 'test-program.so')]),
      });
      expect(existsSync(join(dir, 'env-programs'))).toBe(false);
    });

    it('leaves out --reset when the config disables it', async () => {
      writeConfig(dir, { reset: false });

      await run('--json', 'plan');

      const plan: unknown = JSON.parse(String(lastLog()));
      expect(plan).toMatchObject({ args: ['--bpf-program', PROGRAM_ID, join(dir, 'programs', 'test-program.so'), '--account', ACCOUNT_ID, join(dir, 'accounts', 'test-account.json')] });
    });
  });
});
