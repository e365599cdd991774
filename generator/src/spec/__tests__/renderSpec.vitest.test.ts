import { describe, expect, it } from 'vitest';
import type { ApiOperation } from '@apidocs/shared';
import { isSameReport } from '../../markdown/preamble.js';
import { collectOperations } from '../operations.js';
import { renderOperation, renderSpecMarkdown } from '../renderSpec.js';
import { specDocumentSchema } from '../schema.js';

const fetchUser: ApiOperation = {
  path: '/users/{id}',
  method: 'GET',
  summary: 'Fetch user',
  description: null,
  tags: ['Users', 'Admin'],
  authRequired: true,
  parameters: [{ location: 'path', name: 'id', type: 'string', required: true }],
  requestBody: null,
  responses: [
    {
      status: '200',
      description: 'OK',
      content: [{ contentType: 'application/json', schemaLabel: '#/components/schemas/User' }]
    },
    { status: '404', description: '', content: [] }
  ]
};

describe('renderOperation', () => {
  it('renders the operation block with auth, parameters and responses', () => {
    expect(renderOperation(fetchUser)).toEqual([
      '## GET /users/{id}',
      '**Summary:** Fetch user',
      '**Tags:** Users, Admin',
      '**Auth:** Required',
      '',
      '**Parameters:**',
      '- path id (string, required)',
      '',
      '**Responses:**',
      '- 200: OK',
      '  - application/json: #/components/schemas/User',
      '- 404:',
      '',
      '---',
      ''
    ]);
  });

  it('renders request bodies and omits empty sections', () => {
    const lines = renderOperation({
      path: '/uploads',
      method: 'POST',
      summary: null,
      description: 'Store a file',
      tags: [],
      authRequired: false,
      parameters: [],
      requestBody: [{ contentType: 'multipart/form-data', schemaLabel: 'object' }],
      responses: []
    });

    expect(lines).toEqual([
      '## POST /uploads',
      '**Description:** Store a file',
      '**Auth:** None',
      '',
      '**Request Body:**',
      '- multipart/form-data: object',
      '',
      '---',
      ''
    ]);
  });
});

describe('renderSpecMarkdown', () => {
  const document = specDocumentSchema.parse({
    security: [{ bearerAuth: [] }],
    paths: {
      '/users': { get: { summary: 'List users' }, trace: { summary: 'Ignored' } },
      '/health': { get: { summary: 'Health', security: [] } }
    }
  });

  it('starts with the title, timestamp and fixed preamble', () => {
    const content = renderSpecMarkdown(collectOperations(document), {
      generatedAt: new Date('2025-03-04T05:06:07Z'),
      timeZone: 'UTC'
    });
    const lines = content.split('\n');

    expect(lines.slice(0, 4)).toEqual(['# API Details', 'Generated: 2025-03-04 05:06:07', '', '## Required Headers']);
    expect(lines).toContain('- Authorization: Bearer <token> (required for protected endpoints)');
    expect(lines).toContain('- trace: object (correlation_id, transaction_id, request_id)');
  });

  it('emits one section per recognized operation and none for other verbs', () => {
    const content = renderSpecMarkdown(collectOperations(document), {
      generatedAt: new Date('2025-03-04T05:06:07Z'),
      timeZone: 'UTC'
    });
    const sections = content.split('\n').filter((line) => /^## (GET|POST|PUT|PATCH|DELETE) /.test(line));

    expect(sections).toEqual(['## GET /health', '## GET /users']);
    expect(content).not.toContain('TRACE');
  });

  it('renders identical reports apart from the timestamp line', () => {
    const operations = collectOperations(document);
    const first = renderSpecMarkdown(operations, { generatedAt: new Date('2025-03-04T05:06:07Z'), timeZone: 'UTC' });
    const second = renderSpecMarkdown(operations, { generatedAt: new Date('2025-03-05T09:00:00Z'), timeZone: 'UTC' });

    expect(first).not.toBe(second);
    expect(isSameReport(first, second)).toBe(true);
    expect(first.split('\n').slice(2)).toEqual(second.split('\n').slice(2));
  });
});
