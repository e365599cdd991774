import { afterEach, describe, expect, it } from 'vitest';
import { join } from 'node:path';
import { InputError } from '../../utils/errors.js';
import { createTempTree, removeTempTree } from '../../utils/files.testUtils.js';
import { detectSpecFormat, loadSpecDocument, parseSpecDocument } from '../loadSpec.js';

const JSON_SPEC = JSON.stringify({
  security: [{ bearerAuth: [] }],
  paths: {
    '/users': {
      get: { summary: 'List users', responses: { '200': { description: 'OK' } } }
    }
  }
});

const YAML_SPEC = `security:
  - bearerAuth: []
paths:
  /users:
    get:
      summary: List users
      responses:
        "200":
          description: OK
`;

describe('loadSpecDocument', () => {
  let root: string | null = null;

  afterEach(() => {
    if (root) {
      removeTempTree(root);
      root = null;
    }
  });

  it('reads JSON documents that start with a byte-order mark', () => {
    root = createTempTree({ 'openapi.json': `\uFEFF${JSON_SPEC}` });

    const document = loadSpecDocument(join(root, 'openapi.json'));

    expect(document.paths?.['/users']).toHaveProperty('get');
    expect(document.security).toEqual([{ bearerAuth: [] }]);
  });

  it('reads YAML documents into the same shape as JSON', () => {
    root = createTempTree({ 'openapi.json': JSON_SPEC, 'openapi.yaml': YAML_SPEC });

    expect(loadSpecDocument(join(root, 'openapi.yaml'))).toEqual(loadSpecDocument(join(root, 'openapi.json')));
  });

  it('fails with an input error when the document does not exist', () => {
    root = createTempTree({});
    const missing = join(root, 'missing.json');

    expect(() => loadSpecDocument(missing)).toThrowError(new InputError(`Spec document not found: ${missing}`));
  });

  it('fails with an input error on malformed JSON', () => {
    root = createTempTree({ 'openapi.json': '{"paths": {' });
    const specPath = join(root, 'openapi.json');

    let caught: unknown;
    try {
      loadSpecDocument(specPath);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InputError);
    const error = caught instanceof InputError ? caught : null;
    expect(error?.kind).toBe('input');
    expect(error?.message).toBe(`Unable to parse ${specPath} as JSON`);
    expect(error?.details).toHaveProperty('cause');
  });
});

describe('parseSpecDocument', () => {
  it('rejects documents whose top level is not a mapping', () => {
    expect(() => parseSpecDocument('[]', 'json')).toThrowError('Expected spec document to contain a mapping at the top level');
    expect(() => parseSpecDocument('', 'yaml')).toThrowError(InputError);
  });

  it('detects the format from the file extension', () => {
    expect(detectSpecFormat('/docs/openapi.YML')).toBe('yaml');
    expect(detectSpecFormat('/docs/openapi.yaml')).toBe('yaml');
    expect(detectSpecFormat('/docs/openapi.json')).toBe('json');
    expect(detectSpecFormat('/docs/openapi')).toBe('json');
  });
});
