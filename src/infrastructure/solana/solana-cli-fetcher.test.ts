import type { ArtifactSpec } from '@domain/types/fixture.js';
import { SolanaCliFetcher, buildFetchArgs } from './solana-cli-fetcher.js';

const PROGRAM: ArtifactSpec = {
  identity: 'ProgramIdentity111',
  label: 'Test program',
  method: 'program-dump',
  targetDir: '/work/programs',
  targetPath: '/work/programs/test.so',
};

const ACCOUNT: ArtifactSpec = {
  identity: 'AccountIdentity111',
  label: 'Test account',
  method: 'account-snapshot',
  targetDir: '/work/accounts',
  targetPath: '/work/accounts/AccountIdentity111.json',
};

describe('buildFetchArgs', () => {
  it('dumps programs with `program dump`', () => {
    expect(buildFetchArgs(PROGRAM, 'm')).toEqual([
      'program', 'dump', '-u', 'm', 'ProgramIdentity111', '/work/programs/test.so',
    ]);
  });

  it('snapshots accounts as JSON with `account --output-file`', () => {
    expect(buildFetchArgs(ACCOUNT, 'd')).toEqual([
      'account', '-u', 'd', '--output', 'json', '--output-file',
      '/work/accounts/AccountIdentity111.json', 'AccountIdentity111',
    ]);
  });
});

describe('SolanaCliFetcher', () => {
  it('defaults to the solana binary on mainnet-beta', () => {
    const fetcher = new SolanaCliFetcher();
    expect(fetcher.binaryPath).toBe('solana');
    expect(fetcher.cluster).toBe('m');
  });

  it('invokes the configured binary with the fetch arguments', async () => {
    const mockExec = vi.fn().mockResolvedValue({ stdout: 'Wrote program to /work/programs/test.so\n', stderr: '' });
    const fetcher = new SolanaCliFetcher({ binaryPath: '/opt/solana/bin/solana', cluster: 'l' });
    fetcher.setExecFunction(mockExec);

    await fetcher.fetch(PROGRAM);

    expect(mockExec).toHaveBeenCalledWith('/opt/solana/bin/solana', [
      'program', 'dump', '-u', 'l', 'ProgramIdentity111', '/work/programs/test.so',
    ]);
  });

  it('surfaces the CLI stderr when the command fails', async () => {
    const failure = Object.assign(new Error('Command failed: solana account'), {
      stderr: 'Error: AccountNotFound: pubkey=AccountIdentity111\n',
    });
    const fetcher = new SolanaCliFetcher();
    fetcher.setExecFunction(vi.fn().mockRejectedValue(failure));

    await expect(fetcher.fetch(ACCOUNT)).rejects.toThrow(
      'solana account exited with an error: Error: AccountNotFound: pubkey=AccountIdentity111',
    );
  });

  it('falls back to the error message when stderr is empty', async () => {
    const fetcher = new SolanaCliFetcher();
    fetcher.setExecFunction(vi.fn().mockRejectedValue(new Error('spawn solana ENOENT')));

    await expect(fetcher.fetch(PROGRAM)).rejects.toThrow('solana program exited with an error: spawn solana ENOENT');
  });
});
