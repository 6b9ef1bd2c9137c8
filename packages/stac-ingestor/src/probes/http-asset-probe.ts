/**
 * HTTP Asset Probe
 *
 * Existence check for http(s) assets using native fetch.
 *
 * STATUS MAPPING:
 * - 2xx / 3xx: reachable
 * - 401 / 403: access_denied
 * - 405 / 501: server refuses HEAD, retried once as a one-byte ranged GET
 * - anything else: unreachable
 * - network error: unreachable; abort: timed_out
 *
 * The probe never retries on its own: a per-asset timeout bounds the whole
 * check and the asset checker owns that budget.
 */

import type { AssetProbe, ProbeOptions, ProbeResult } from '../core/types.js';

export interface HttpAssetProbeConfig {
  /** User-Agent header sent with each probe */
  readonly userAgent: string;
  /** Extra headers (e.g. an authorization header for a private bucket gateway) */
  readonly headers?: Readonly<Record<string, string>>;
}

export class HttpAssetProbe implements AssetProbe {
  private readonly config: HttpAssetProbeConfig;

  constructor(config?: Partial<HttpAssetProbeConfig>) {
    this.config = {
      userAgent: 'stac-ingestor/0.1',
      ...config,
    };
  }

  async probe(href: string, options: ProbeOptions): Promise<ProbeResult> {
    const head = await this.request(href, 'HEAD', options);
    if (head instanceof Response && (head.status === 405 || head.status === 501)) {
      return this.classify(await this.request(href, 'GET', options));
    }
    return this.classify(head);
  }

  private async request(
    href: string,
    method: 'HEAD' | 'GET',
    options: ProbeOptions
  ): Promise<Response | ProbeResult> {
    const timeout = new AbortController();
    const timeoutId = setTimeout(() => timeout.abort(), options.timeoutMs);
    const signal = mergeAbortSignals([timeout.signal, options.signal]);

    try {
      const response = await fetch(href, {
        method,
        headers: {
          'User-Agent': this.config.userAgent,
          ...(method === 'GET' && { Range: 'bytes=0-0' }),
          ...this.config.headers,
        },
        redirect: 'follow',
        signal,
      });

      if (method === 'GET' && response.body) {
        await response.body.cancel();
      }

      return response;
    } catch (error) {
      if (signal.aborted) {
        return { status: 'timed_out' };
      }
      return {
        status: 'unreachable',
        detail: `Network error: ${error instanceof Error ? error.message : String(error)}`,
      };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private classify(result: Response | ProbeResult): ProbeResult {
    if (!(result instanceof Response)) {
      return result;
    }

    const status = result.status;
    if (status >= 200 && status < 400) {
      return { status: 'reachable' };
    }
    if (status === 401 || status === 403) {
      return { status: 'access_denied', detail: `HTTP ${status}` };
    }
    return { status: 'unreachable', detail: `HTTP ${status}` };
  }
}

/**
 * Merge multiple AbortSignals into one
 *
 * The merged signal aborts when ANY of the input signals abort.
 */
function mergeAbortSignals(signals: readonly AbortSignal[]): AbortSignal {
  const controller = new AbortController();

  for (const signal of signals) {
    if (signal.aborted) {
      controller.abort();
      break;
    }

    signal.addEventListener('abort', () => controller.abort(), { once: true });
  }

  return controller.signal;
}
