import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfluencePublisher, type ConfluenceSettings } from '../connector/confluence/publisher.js';
import { ArtifactStore } from '../runtime/artifact-store.js';
import { PublishError } from '../shared/errors.js';
import { createFakeFetch, jsonResponse } from './test-helpers.js';

const settings: ConfluenceSettings = {
  baseUrl: 'https://wiki.example.test/wiki/',
  user: 'ci@example.test',
  token: 'test-secret',
  spaceKey: 'DEMO',
  titlePrefix: 'Test Result Report',
};

const BASE = 'https://wiki.example.test/wiki';
const TITLE = 'Test Result Report v7 (PASS)';

describe('ConfluencePublisher.resolveLink', () => {
  it('links directly to the single matching page', async () => {
    const { fetch, calls } = createFakeFetch(() => jsonResponse({ results: [{ id: '12345', title: TITLE }] }));
    const publisher = new ConfluencePublisher(settings, fetch);

    const link = await publisher.resolveLink(7, 'PASS');

    expect(link).toEqual({
      url: `${BASE}/pages/12345/Test+Result+Report+v7+(PASS)`,
      fallbackUrl: `${BASE}/spaces/DEMO/pages`,
      resolved: true,
    });
    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe(
      `${BASE}/rest/api/content/search?cql=${encodeURIComponent(`space="DEMO" AND type=page AND title="${TITLE}"`)}&limit=25`,
    );
  });

  it('sends basic auth built from the configured credentials', async () => {
    const { fetch, calls } = createFakeFetch(() => jsonResponse({ results: [] }));
    await new ConfluencePublisher(settings, fetch).resolveLink(7, 'PASS');

    const expected = `Basic ${Buffer.from('ci@example.test:test-secret').toString('base64')}`;
    expect(calls[0]?.init?.headers).toEqual({ Authorization: expected, Accept: 'application/json' });
  });

  it('falls back to the space root when nothing matches', async () => {
    const { fetch } = createFakeFetch(() => jsonResponse({ results: [] }));
    const link = await new ConfluencePublisher(settings, fetch).resolveLink(7, 'PASS');

    expect(link).toEqual({ url: null, fallbackUrl: `${BASE}/spaces/DEMO/pages`, resolved: false });
  });

  it('falls back when more than one page carries the title', async () => {
    const { fetch } = createFakeFetch(() =>
      jsonResponse({
        results: [
          { id: '1', title: TITLE },
          { id: '2', title: TITLE },
        ],
      }),
    );
    const link = await new ConfluencePublisher(settings, fetch).resolveLink(7, 'PASS');

    expect(link.resolved).toBe(false);
    expect(link.url).toBeNull();
  });

  it('ignores search hits whose title only resembles the run', async () => {
    const { fetch } = createFakeFetch(() =>
      jsonResponse({
        results: [
          { id: '1', title: 'Test Result Report v7 (PASS) copy' },
          { id: '2', title: TITLE },
        ],
      }),
    );
    const link = await new ConfluencePublisher(settings, fetch).resolveLink(7, 'PASS');

    expect(link.url).toBe(`${BASE}/pages/2/Test+Result+Report+v7+(PASS)`);
  });

  it('falls back when the lookup fails or returns garbage', async () => {
    const throwing = new ConfluencePublisher(settings, async () => {
      throw new Error('ECONNRESET');
    });
    const erroring = new ConfluencePublisher(settings, createFakeFetch(() => new Response('nope', { status: 500 })).fetch);
    const malformed = new ConfluencePublisher(settings, createFakeFetch(() => jsonResponse({ items: [] })).fetch);

    for (const publisher of [throwing, erroring, malformed]) {
      await expect(publisher.resolveLink(7, 'PASS')).resolves.toEqual({
        url: null,
        fallbackUrl: `${BASE}/spaces/DEMO/pages`,
        resolved: false,
      });
    }
  });

  it('honours an explicit space key', async () => {
    const { fetch } = createFakeFetch(() => jsonResponse({ results: [] }));
    const link = await new ConfluencePublisher(settings, fetch).resolveLink(3, 'FAIL', 'OPS');

    expect(link.fallbackUrl).toBe(`${BASE}/spaces/OPS/pages`);
  });
});

describe('ConfluencePublisher.publishReport', () => {
  let dir: string;
  let store: ArtifactStore;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'secpipe-pub-'));
    store = new ArtifactStore(dir);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('creates a new page and uploads existing attachments', async () => {
    const pdf = store.write('test_result_report_v7.pdf', '%PDF-1.3');
    const missing = store.ref('zap_dast_report.html');
    const { fetch, calls } = createFakeFetch((url, method) => {
      if (method === 'GET') return jsonResponse({ results: [] });
      if (url === `${BASE}/rest/api/content`) return jsonResponse({ id: '900', title: TITLE });
      return jsonResponse({ results: [{ id: 'att1', title: 'test_result_report_v7.pdf' }] });
    });

    const result = await new ConfluencePublisher(settings, fetch).publishReport(7, 'PASS', '<p>body</p>', [
      pdf,
      missing,
    ]);

    expect(result).toEqual({ pageId: '900', created: true, uploaded: ['test_result_report_v7.pdf'], failedUploads: [] });
    expect(calls.map((c) => `${c.method} ${c.url}`)).toEqual([
      `GET ${BASE}/rest/api/content?title=${encodeURIComponent(TITLE)}&spaceKey=DEMO&expand=version`,
      `POST ${BASE}/rest/api/content`,
      `GET ${BASE}/rest/api/content/900/child/attachment?filename=test_result_report_v7.pdf&expand=version`,
      `POST ${BASE}/rest/api/content/900/child/attachment`,
    ]);
    const created = JSON.parse(String(calls[1]?.init?.body));
    expect(created).toEqual({
      type: 'page',
      title: TITLE,
      space: { key: 'DEMO' },
      body: { storage: { value: '<p>body</p>', representation: 'storage' } },
    });
  });

  it('bumps the version of an existing page', async () => {
    const { fetch, calls } = createFakeFetch((_url, method) => {
      if (method === 'GET') return jsonResponse({ results: [{ id: '55', title: TITLE, version: { number: 4 } }] });
      return jsonResponse({ id: '55' });
    });

    const result = await new ConfluencePublisher(settings, fetch).publishReport(7, 'PASS', '<p>v2</p>', []);

    expect(result.created).toBe(false);
    expect(calls[1]?.method).toBe('PUT');
    expect(calls[1]?.url).toBe(`${BASE}/rest/api/content/55`);
    expect(JSON.parse(String(calls[1]?.init?.body)).version).toEqual({ number: 5 });
  });

  it('replaces an attachment that already exists and records failed uploads', async () => {
    const html = store.write('test_result_report_v7.html', '<html></html>');
    const txt = store.write('version.txt', '7\n');
    const { fetch, calls } = createFakeFetch((url, method) => {
      if (method === 'GET' && url.includes('filename=test_result_report_v7.html')) {
        return jsonResponse({ results: [{ id: 'att9', title: 'test_result_report_v7.html' }] });
      }
      if (method === 'GET' && url.includes('filename=')) return jsonResponse({ results: [] });
      if (method === 'GET') return jsonResponse({ results: [{ id: '55', title: TITLE, version: { number: 1 } }] });
      if (method === 'PUT') return jsonResponse({ id: '55' });
      if (url.endsWith('/att9/data')) return jsonResponse({ results: [] });
      return new Response('too large', { status: 413 });
    });

    const result = await new ConfluencePublisher(settings, fetch).publishReport(7, 'PASS', '', [html, txt]);

    expect(result.uploaded).toEqual(['test_result_report_v7.html']);
    expect(result.failedUploads).toEqual(['version.txt']);
    expect(calls.some((c) => c.url === `${BASE}/rest/api/content/55/child/attachment/att9/data`)).toBe(true);
  });

  it('throws PublishError when the page cannot be written', async () => {
    const { fetch } = createFakeFetch((_url, method) =>
      method === 'GET' ? jsonResponse({ results: [] }) : new Response('forbidden', { status: 403 }),
    );

    const attempt = new ConfluencePublisher(settings, fetch).publishReport(7, 'PASS', '', []);

    await expect(attempt).rejects.toBeInstanceOf(PublishError);
    await expect(attempt).rejects.toThrow('Confluence page create failed 403: forbidden');
  });
});
