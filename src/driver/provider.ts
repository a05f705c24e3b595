import { z } from 'zod';

import type { RemoteConfig } from '../schema/config.js';
import type { CapabilityEnvelope } from '../schema/session.js';
import { TIMEOUTS } from '../config/defaults.js';
import { ProviderError } from '../errors.js';
import * as log from '../utils/logger.js';
import { browserTypeFor, openDriver } from './playwright.js';
import type { RemoteProvider, RemoteSession } from './protocol.js';

// ── Response validation ──────────────────────────────────────

const createJobResponseSchema = z.object({
  jobId: z.string().min(1),
  /** Optional per-job endpoint; falls back to the configured one. */
  wsEndpoint: z.string().url().optional(),
});

// ── Rate-limit-aware fetch ───────────────────────────────────

const MAX_RETRIES = 3;

/**
 * Retry-After is either delay seconds or an HTTP date. Anything unreadable
 * falls back to a linear backoff.
 */
export function retryDelayMs(retryAfter: string | null, attempt: number, now = Date.now()): number {
  const backoff = (attempt + 1) * 2000;
  if (retryAfter === null || retryAfter.trim() === '') return backoff;
  const value = retryAfter.trim();
  if (/^\d+(\.\d+)?$/.test(value)) return parseFloat(value) * 1000;
  const date = Date.parse(value);
  return Number.isFinite(date) ? Math.max(0, date - now) : backoff;
}

async function fetchWithRetry(
  operation: string,
  url: string,
  init: RequestInit,
): Promise<Response> {
  for (let attempt = 0; attempt < MAX_RETRIES; attempt++) {
    let response: Response;
    try {
      response = await fetch(url, {
        ...init,
        signal: AbortSignal.timeout(TIMEOUTS.PROVIDER_REQUEST_TIMEOUT),
      });
    } catch (err) {
      throw new ProviderError(operation, `request to ${url} failed`, err);
    }

    if (response.status === 429) {
      const waitMs = retryDelayMs(response.headers.get('retry-after'), attempt);
      log.warn(
        `Provider rate limited ${operation}, waiting ${String(Math.round(waitMs / 1000))}s...`,
      );
      await new Promise((r) => setTimeout(r, waitMs));
      continue;
    }

    if (!response.ok) {
      const body = await response.text();
      throw new ProviderError(
        operation,
        `HTTP ${String(response.status)} from ${url}: ${body}`,
      );
    }

    return response;
  }

  throw new ProviderError(operation, 'max retries exceeded due to rate limiting');
}

// ── Provider factory ─────────────────────────────────────────

/**
 * Remote provider speaking a small REST API for job records and the
 * Playwright websocket protocol for the browser itself.
 *
 *   POST {apiUrl}/jobs           envelope      → { jobId, wsEndpoint? }
 *   PUT  {apiUrl}/jobs/{jobId}   { passed }
 *   PUT  {apiUrl}/jobs/{jobId}   { status: "complete" }
 */
export function createHttpProvider(config: RemoteConfig): RemoteProvider {
  const apiUrl = config.apiUrl.replace(/\/+$/, '');

  function headers(): Record<string, string> {
    const result: Record<string, string> = { 'Content-Type': 'application/json' };
    if (config.accessKey !== undefined) {
      result['Authorization'] = `Bearer ${config.accessKey}`;
    }
    return result;
  }

  function jobUrl(jobId: string): string {
    return `${apiUrl}/jobs/${encodeURIComponent(jobId)}`;
  }

  async function updateJob(operation: string, jobId: string, body: unknown): Promise<void> {
    await fetchWithRetry(operation, jobUrl(jobId), {
      method: 'PUT',
      headers: headers(),
      body: JSON.stringify(body),
    });
  }

  return {
    async openSession(envelope: CapabilityEnvelope): Promise<RemoteSession> {
      const response = await fetchWithRetry('openSession', `${apiUrl}/jobs`, {
        method: 'POST',
        headers: headers(),
        body: JSON.stringify(envelope),
      });

      const parsed = createJobResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new ProviderError('openSession', `malformed job response: ${parsed.error.message}`);
      }
      const { jobId } = parsed.data;

      const endpoint = new URL(parsed.data.wsEndpoint ?? config.wsEndpoint);
      endpoint.searchParams.set('jobId', jobId);

      try {
        const browser = await browserTypeFor(envelope.browserName).connect(endpoint.toString(), {
          headers: headers(),
        });
        const driver = await openDriver(browser);
        return { driver, jobId };
      } catch (err) {
        // No browser is bound to the job.
        await updateJob('closeJob', jobId, { status: 'complete' }).catch((closeErr: unknown) => {
          log.warn(`Could not close orphaned job ${jobId}: ${String(closeErr)}`);
        });
        throw new ProviderError('openSession', `could not connect to ${endpoint.host}`, err);
      }
    },

    async reportOutcome(jobId: string, passed: boolean): Promise<void> {
      await updateJob('reportOutcome', jobId, { passed });
    },

    async closeJob(jobId: string): Promise<void> {
      await updateJob('closeJob', jobId, { status: 'complete' });
    },
  };
}
