import type { ArtifactSpec, ProvisionResult } from '@domain/types/fixture.js';
import { ConsoleReporter } from './console-reporter.js';

const SPEC: ArtifactSpec = {
  identity: 'ProgA',
  label: 'Program A',
  method: 'program-dump',
  targetDir: '/work/programs',
  targetPath: '/work/programs/a.so',
};

const RESULT: ProvisionResult = { spec: SPEC, path: SPEC.targetPath, status: 'fetched' };

function makeReporter(baseDir?: string) {
  const write = vi.fn();
  const reporter = new ConsoleReporter({ baseDir, write, color: false });
  return { reporter, write };
}

describe('ConsoleReporter', () => {
  it('prints paths relative to the working directory', () => {
    const { reporter, write } = makeReporter('/work');

    reporter.directoryCreated('/work/programs');
    reporter.fetchStarted(SPEC);
    reporter.fetchCompleted(RESULT);
    reporter.cacheHit({ ...RESULT, status: 'cached' });

    expect(write.mock.calls.map(([line]) => line)).toEqual([
      'Created directory: ./programs',
      'Downloading Program A...',
      'Downloaded Program A to ./programs/a.so',
      'Using cached Program A at ./programs/a.so',
    ]);
  });

  it('keeps absolute paths outside the working directory', () => {
    const { reporter, write } = makeReporter('/elsewhere');
    reporter.directoryCreated('/work/programs');
    expect(write).toHaveBeenCalledWith('Created directory: /work/programs');
  });

  it('announces the validator launch', () => {
    const { reporter, write } = makeReporter();
    reporter.launching({ command: 'solana-test-validator', args: [], bindings: [], passthrough: [] });
    expect(write).toHaveBeenCalledWith('Starting solana-test-validator...');
  });
});
