import { ReleaseInfo, ReleaseLookup } from '../types/Firmware';
import { RELEASE_CONFIG } from '../config';
import { Clock, systemClock } from '../utils/clock';
import { isRecord, isErrorLike } from '../utils/json';
import { parseVersion } from '../utils/version';
import { sanitizeLogData } from '../utils/sanitize';

export interface ReleaseResolverOptions {
  apiUrl?: string;
  releaseNotesUrl?: string;
  assetName?: string;
  cacheTtlMs?: number;
  fetchTimeoutMs?: number;
  clock?: Clock;
}

interface CachedRelease {
  release: ReleaseInfo;
  fetchedAt: number;
}

function findDownloadUrl(assets: unknown, assetName: string): string | null {
  if (!Array.isArray(assets)) return null;
  const binaries: { name: string; url: string }[] = [];
  for (const asset of assets) {
    if (!isRecord(asset)) continue;
    const { name, browser_download_url: url } = asset;
    if (typeof name === 'string' && typeof url === 'string') {
      binaries.push({ name: name.toLowerCase(), url });
    }
  }
  const exact = binaries.find(a => a.name === assetName.toLowerCase());
  if (exact) return exact.url;
  const firstBin = binaries.find(a => a.name.endsWith('.bin'));
  return firstBin ? firstBin.url : null;
}

/**
 * Turns a GitHub "latest release" payload into a ReleaseInfo. Returns null
 * when the tag does not carry a usable version.
 */
export function parseReleasePayload(payload: unknown, assetName: string, releaseUrl: string): ReleaseInfo | null {
  if (!isRecord(payload)) return null;

  const tag = typeof payload.tag_name === 'string' ? payload.tag_name.trim() : '';
  const version = tag.replace(/^[vV]/, '');
  if (!version || !parseVersion(version)) return null;

  const publishedAt = typeof payload.published_at === 'string' ? payload.published_at : '';

  return {
    version,
    releaseDate: publishedAt.split('T')[0],
    releaseNotes: typeof payload.body === 'string' ? payload.body : '',
    downloadUrl: findDownloadUrl(payload.assets, assetName),
    releaseUrl,
  };
}

export class ReleaseResolver {
  private apiUrl: string;
  private releaseNotesUrl: string;
  private assetName: string;
  private cacheTtlMs: number;
  private fetchTimeoutMs: number;
  private clock: Clock;
  private cached: CachedRelease | null = null;
  private inFlight: Promise<ReleaseLookup> | null = null;

  constructor(options: ReleaseResolverOptions = {}) {
    this.apiUrl = options.apiUrl ?? RELEASE_CONFIG.apiUrl;
    this.releaseNotesUrl = options.releaseNotesUrl ?? RELEASE_CONFIG.releaseNotesUrl;
    this.assetName = options.assetName ?? RELEASE_CONFIG.assetName;
    this.cacheTtlMs = options.cacheTtlMs ?? RELEASE_CONFIG.cacheTtlMs;
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? RELEASE_CONFIG.fetchTimeoutMs;
    this.clock = options.clock ?? systemClock;
  }

  async getLatestRelease(options: { refresh?: boolean } = {}): Promise<ReleaseLookup> {
    const fresh = this.getCached();
    if (fresh && !options.refresh) {
      return { ok: true, release: fresh };
    }

    // Concurrent callers share one upstream request
    if (!this.inFlight) {
      this.inFlight = this.fetchRelease()
        .then((result) => {
          if (result.ok) {
            this.cached = { release: result.release, fetchedAt: this.clock.now() };
          }
          return result;
        })
        .finally(() => {
          this.inFlight = null;
        });
    }
    return this.inFlight;
  }

  /** Cached release if it is still within the TTL. */
  getCached(): ReleaseInfo | null {
    if (!this.cached) return null;
    if (this.clock.now() - this.cached.fetchedAt >= this.cacheTtlMs) {
      return null;
    }
    return this.cached.release;
  }

  invalidate(): void {
    this.cached = null;
  }

  private async fetchRelease(): Promise<ReleaseLookup> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.fetchTimeoutMs);
    try {
      console.debug('ReleaseResolver: fetching latest release information');
      const res = await fetch(this.apiUrl, {
        method: 'GET',
        signal: controller.signal,
        headers: {
          Accept: 'application/vnd.github+json',
          'User-Agent': 'tasmota-fleet-updater',
        },
      });

      if (!res.ok) {
        console.error(`ReleaseResolver: release source answered HTTP ${res.status}`);
        return { ok: false, error: `Release source answered HTTP ${res.status}` };
      }

      let payload: unknown;
      try {
        payload = await res.json();
      } catch {
        console.error('ReleaseResolver: release payload is not valid JSON');
        return { ok: false, error: 'Release payload is not valid JSON' };
      }

      const release = parseReleasePayload(payload, this.assetName, this.releaseNotesUrl);
      if (!release) {
        console.error('ReleaseResolver: release payload carries no usable version');
        return { ok: false, error: 'Release payload carries no usable version' };
      }

      console.log(`ReleaseResolver: latest release ${release.version}, published ${release.releaseDate}`);
      return { ok: true, release };
    } catch (err) {
      const message = sanitizeLogData(isErrorLike(err) ? err.message : err);
      console.error(`ReleaseResolver: release source unreachable: ${message}`);
      return { ok: false, error: `Release source unreachable: ${message}` };
    } finally {
      clearTimeout(timer);
    }
  }
}
