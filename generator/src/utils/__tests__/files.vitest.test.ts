import { afterEach, describe, expect, it } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { describeError, InputError, OutputError } from '../errors.js';
import { listSourceFiles, readSourceFile, toDisplayPath, writeReport } from '../files.js';
import { createTempTree, removeTempTree } from '../files.testUtils.js';

describe('file helpers', () => {
  let root: string | null = null;

  afterEach(() => {
    if (root) {
      removeTempTree(root);
      root = null;
    }
  });

  it('lists matching files depth first in name order', () => {
    root = createTempTree({
      'b/Second.php': '',
      'a/z/Deep.php': '',
      'a/First.php': '',
      'a/notes.md': ''
    });

    expect(listSourceFiles(root, '.php')).toEqual([
      join(root, 'a/First.php'),
      join(root, 'a/z/Deep.php'),
      join(root, 'b/Second.php')
    ]);
  });

  it('decodes valid UTF-8 without marking the file lossy', () => {
    root = createTempTree({ 'ok.php': "<?php echo 'héllo';" });

    expect(readSourceFile(join(root, 'ok.php'))).toEqual({ text: "<?php echo 'héllo';", lossy: false });
  });

  it('renders paths relative to the root with forward slashes', () => {
    expect(toDisplayPath('/srv/app', '/srv/app/backend/app/Controllers/UserController.php')).toBe(
      'backend/app/Controllers/UserController.php'
    );
    expect(toDisplayPath('/srv/app', '/opt/shared/routes.php')).toBe('/opt/shared/routes.php');
  });

  it('creates the output directory before writing', () => {
    root = createTempTree({});
    const outputPath = join(root, 'docs/architecture/API_DETAILS.md');

    writeReport(outputPath, '# API Details\n');

    expect(readFileSync(outputPath, 'utf-8')).toBe('# API Details\n');
  });

  it('wraps write failures in an output error', () => {
    root = createTempTree({ 'docs': 'not a directory' });
    const outputPath = join(root, 'docs/API_DETAILS.md');

    expect(() => writeReport(outputPath, 'x')).toThrowError(OutputError);
    expect(existsSync(outputPath)).toBe(false);
  });
});

describe('describeError', () => {
  it('includes the error name and details', () => {
    expect(describeError(new InputError('Spec document not found: /tmp/a.json'))).toBe(
      'InputError: Spec document not found: /tmp/a.json'
    );
    expect(describeError(new OutputError('Unable to write /tmp/out.md', { cause: 'EACCES' }))).toBe(
      'OutputError: Unable to write /tmp/out.md {"cause":"EACCES"}'
    );
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
  });
});
