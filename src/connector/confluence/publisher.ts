/**
 * Confluence report publisher.
 *
 * Pages are correlated to runs purely by title ("<prefix> v<N> (<STATUS>)"), so
 * link resolution is a best-effort title search: anything other than exactly
 * one hit degrades to the space root instead of failing the run.
 *
 * All outbound HTTP goes through the injected fetch so tests can stand in for
 * the server.
 */
import { readFileSync } from 'node:fs';
import { basename } from 'node:path';
import { ContentCreatedSchema, ContentSearchResponseSchema } from '../../shared/schemas.js';
import { PublishError } from '../../shared/errors.js';
import { logger } from '../../shared/logger.js';
import { reportTitle } from '../../runtime/correlator.js';
import type { ArtifactRef, PublishedLink, ReportStatus } from '../../runtime/types.js';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface ConfluenceSettings {
  baseUrl: string;
  user: string;
  token: string;
  spaceKey: string;
  titlePrefix: string;
}

export interface PageSummary {
  id: string;
  title: string;
}

export interface PublishResult {
  pageId: string;
  created: boolean;
  uploaded: string[];
  failedUploads: string[];
}

function cqlQuote(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export class ConfluencePublisher {
  private readonly base: string;
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly settings: ConfluenceSettings,
    fetchImpl?: FetchLike,
  ) {
    this.base = settings.baseUrl.replace(/\/+$/, '');
    this.fetchImpl = fetchImpl ?? ((url, init) => fetch(url, init));
  }

  titleFor(version: number, status: ReportStatus): string {
    return reportTitle(this.settings.titlePrefix, { version, status });
  }

  spaceRootUrl(spaceKey: string = this.settings.spaceKey): string {
    return `${this.base}/spaces/${encodeURIComponent(spaceKey)}/pages`;
  }

  pageUrl(page: PageSummary): string {
    return `${this.base}/pages/${encodeURIComponent(page.id)}/${encodeURI(page.title.replace(/ /g, '+'))}`;
  }

  /**
   * Resolve the published page for a run. Never throws: zero or ambiguous
   * matches, HTTP failures and malformed responses all yield the space root.
   */
  async resolveLink(
    version: number,
    status: ReportStatus,
    spaceKey: string = this.settings.spaceKey,
  ): Promise<PublishedLink> {
    const fallbackUrl = this.spaceRootUrl(spaceKey);
    const title = this.titleFor(version, status);
    try {
      const matches = await this.searchByTitle(title, spaceKey);
      const exact = matches.filter((m) => m.title === title);
      const only = exact.length === 1 ? exact[0] : undefined;
      if (!only) {
        logger.warn('Report page not uniquely resolved – using space root', {
          title,
          matches: exact.length,
        });
        return { url: null, fallbackUrl, resolved: false };
      }
      return { url: this.pageUrl(only), fallbackUrl, resolved: true };
    } catch (err) {
      logger.warn('Report page lookup failed – using space root', { title, error: (err as Error).message });
      return { url: null, fallbackUrl, resolved: false };
    }
  }

  async searchByTitle(title: string, spaceKey: string = this.settings.spaceKey): Promise<PageSummary[]> {
    const cql = `space=${cqlQuote(spaceKey)} AND type=page AND title=${cqlQuote(title)}`;
    const url = `${this.base}/rest/api/content/search?cql=${encodeURIComponent(cql)}&limit=25`;
    const resp = await this.fetchImpl(url, { method: 'GET', headers: this.headers() });
    if (!resp.ok) {
      throw new PublishError(`Confluence search failed ${resp.status}: ${await resp.text()}`, resp.status);
    }
    const data = ContentSearchResponseSchema.parse(await resp.json());
    return data.results.map((r) => ({ id: r.id, title: r.title }));
  }

  /**
   * Create the run's page (or bump the existing one with the same title) and
   * attach the report files. A failed attachment is logged and skipped; a
   * failed page write throws PublishError.
   */
  async publishReport(
    version: number,
    status: ReportStatus,
    bodyHtml: string,
    attachments: readonly ArtifactRef[],
  ): Promise<PublishResult> {
    const title = this.titleFor(version, status);
    const { pageId, created } = await this.upsertPage(title, bodyHtml);

    const uploaded: string[] = [];
    const failedUploads: string[] = [];
    for (const file of attachments) {
      if (!file.exists) continue;
      try {
        await this.upsertAttachment(pageId, file.path);
        uploaded.push(file.name);
      } catch (err) {
        failedUploads.push(file.name);
        logger.warn('Attachment upload failed', { page_id: pageId, file: file.name, error: (err as Error).message });
      }
    }

    logger.info('Report published to Confluence', {
      page_id: pageId,
      title,
      created,
      uploaded: uploaded.length,
      failed: failedUploads.length,
    });
    return { pageId, created, uploaded, failedUploads };
  }

  private async upsertPage(title: string, bodyHtml: string): Promise<{ pageId: string; created: boolean }> {
    const lookup = await this.fetchImpl(
      `${this.base}/rest/api/content?title=${encodeURIComponent(title)}&spaceKey=${encodeURIComponent(this.settings.spaceKey)}&expand=version`,
      { method: 'GET', headers: this.headers() },
    );
    if (!lookup.ok) {
      throw new PublishError(`Confluence page lookup failed ${lookup.status}: ${await lookup.text()}`, lookup.status);
    }
    const existing = ContentSearchResponseSchema.parse(await lookup.json()).results[0];
    const body = { storage: { value: bodyHtml, representation: 'storage' } };

    if (existing) {
      const resp = await this.fetchImpl(`${this.base}/rest/api/content/${encodeURIComponent(existing.id)}`, {
        method: 'PUT',
        headers: this.headers({ 'Content-Type': 'application/json' }),
        body: JSON.stringify({
          id: existing.id,
          type: 'page',
          title,
          version: { number: (existing.version?.number ?? 1) + 1 },
          body,
        }),
      });
      if (!resp.ok) {
        throw new PublishError(`Confluence page update failed ${resp.status}: ${await resp.text()}`, resp.status);
      }
      return { pageId: existing.id, created: false };
    }

    const resp = await this.fetchImpl(`${this.base}/rest/api/content`, {
      method: 'POST',
      headers: this.headers({ 'Content-Type': 'application/json' }),
      body: JSON.stringify({ type: 'page', title, space: { key: this.settings.spaceKey }, body }),
    });
    if (!resp.ok) {
      throw new PublishError(`Confluence page create failed ${resp.status}: ${await resp.text()}`, resp.status);
    }
    const created = ContentCreatedSchema.parse(await resp.json());
    return { pageId: created.id, created: true };
  }

  private async upsertAttachment(pageId: string, filePath: string): Promise<void> {
    const name = basename(filePath);
    const attachmentsUrl = `${this.base}/rest/api/content/${encodeURIComponent(pageId)}/child/attachment`;
    const check = await this.fetchImpl(`${attachmentsUrl}?filename=${encodeURIComponent(name)}&expand=version`, {
      method: 'GET',
      headers: this.headers(),
    });
    const current = check.ok ? ContentSearchResponseSchema.parse(await check.json()).results[0] : undefined;

    const form = new FormData();
    form.append('file', new Blob([readFileSync(filePath)]), name);
    const target = current ? `${attachmentsUrl}/${encodeURIComponent(current.id)}/data` : attachmentsUrl;

    const resp = await this.fetchImpl(target, {
      method: 'POST',
      headers: this.headers({ 'X-Atlassian-Token': 'no-check' }),
      body: form,
    });
    if (!resp.ok) {
      throw new PublishError(`upload of ${name} failed ${resp.status}: ${await resp.text()}`, resp.status);
    }
  }

  private headers(extra: Record<string, string> = {}): Record<string, string> {
    const credentials = Buffer.from(`${this.settings.user}:${this.settings.token}`).toString('base64');
    return { Authorization: `Basic ${credentials}`, Accept: 'application/json', ...extra };
  }
}
