/**
 * Asset probes by URI scheme
 *
 * - http(s): HEAD probe
 * - s3: rewritten to the bucket's virtual-hosted HTTPS endpoint
 * - file: readable-file check
 */

import { access, constants } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import type { IngestorConfig } from '../core/config.js';
import type { AssetProbe, ProbeOptions, ProbeResult } from '../core/types.js';
import { HttpAssetProbe } from './http-asset-probe.js';

export { HttpAssetProbe } from './http-asset-probe.js';

/**
 * Probe for `s3://bucket/key` hrefs through the bucket's HTTPS endpoint
 *
 * Works for publicly readable buckets or behind a signing gateway passed
 * as the endpoint template.
 */
export class S3AssetProbe implements AssetProbe {
  constructor(
    private readonly http: AssetProbe,
    private readonly endpointTemplate: string,
    private readonly region: string
  ) {}

  toHttpsUrl(href: string): string | null {
    const match = /^s3:\/\/([^/]+)\/(.+)$/.exec(href);
    if (!match) {
      return null;
    }
    const [, bucket, key] = match;
    const base = this.endpointTemplate
      .replace('{bucket}', bucket)
      .replace('{region}', this.region)
      .replace(/\/+$/, '');
    const encodedKey = key.split('/').map(encodeURIComponent).join('/');
    return `${base}/${encodedKey}`;
  }

  async probe(href: string, options: ProbeOptions): Promise<ProbeResult> {
    const url = this.toHttpsUrl(href);
    if (!url) {
      return { status: 'unreachable', detail: `Malformed S3 URI: ${href}` };
    }
    return this.http.probe(url, options);
  }
}

/**
 * Probe for `file://` hrefs
 */
export class FileAssetProbe implements AssetProbe {
  async probe(href: string): Promise<ProbeResult> {
    let path: string;
    try {
      path = fileURLToPath(href);
    } catch (error) {
      return {
        status: 'unreachable',
        detail: error instanceof Error ? error.message : String(error),
      };
    }

    try {
      await access(path, constants.R_OK);
      return { status: 'reachable' };
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? String(error.code) : 'UNKNOWN';
      if (code === 'EACCES' || code === 'EPERM') {
        return { status: 'access_denied', detail: code };
      }
      return { status: 'unreachable', detail: code };
    }
  }
}

/**
 * Route each href to the probe registered for its scheme
 */
export class SchemeRoutingAssetProbe implements AssetProbe {
  constructor(private readonly probes: Readonly<Record<string, AssetProbe>>) {}

  async probe(href: string, options: ProbeOptions): Promise<ProbeResult> {
    const scheme = /^([a-z][a-z0-9+.-]*):/i.exec(href)?.[1]?.toLowerCase();
    if (!scheme) {
      return { status: 'unreachable', detail: `Not an absolute URI: ${href}` };
    }

    const probe = this.probes[scheme];
    if (!probe) {
      return { status: 'unreachable', detail: `Unsupported URI scheme: ${scheme}` };
    }

    return probe.probe(href, options);
  }
}

/**
 * Default probe stack for the configured environment
 */
export function createAssetProbe(config: IngestorConfig['assets']): AssetProbe {
  const http = new HttpAssetProbe({ userAgent: config.userAgent });
  return new SchemeRoutingAssetProbe({
    http,
    https: http,
    s3: new S3AssetProbe(http, config.s3Endpoint, config.s3Region),
    file: new FileAssetProbe(),
  });
}
