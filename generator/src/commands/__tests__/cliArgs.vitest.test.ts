import { describe, expect, it } from 'vitest';
import { parseCliArgs } from '../cliArgs.js';

describe('parseCliArgs', () => {
  it('maps flags onto configuration overrides', () => {
    expect(
      parseCliArgs(['--check', '--spec', 'api.yaml', '--out', 'docs/out.md', '--time-zone', 'UTC'], 'outputPath')
    ).toEqual({
      check: true,
      help: false,
      overrides: { specPath: 'api.yaml', outputPath: 'docs/out.md', timeZone: 'UTC' }
    });
  });

  it('routes --out to the output field of the calling script', () => {
    const options = parseCliArgs(['--out', 'docs/code.md', '--scan', 'app, modules', '--controllers', 'app/Controllers'], 'codeOutputPath');

    expect(options.overrides).toEqual({
      codeOutputPath: 'docs/code.md',
      scanRoots: ['app', 'modules'],
      controllerDirs: ['app/Controllers']
    });
  });

  it('flags help requests', () => {
    expect(parseCliArgs(['-h'], 'outputPath').help).toBe(true);
  });

  it('rejects missing values and unknown options', () => {
    expect(() => parseCliArgs(['--spec'], 'outputPath')).toThrowError('--spec requires a value');
    expect(() => parseCliArgs(['--root', '--check'], 'outputPath')).toThrowError('--root requires a value');
    expect(() => parseCliArgs(['--verbose'], 'outputPath')).toThrowError('Unknown option: --verbose');
  });
});
