import { ReleaseResolver, parseReleasePayload } from '../src/services/ReleaseResolver';
import { FakeClock } from './helpers/fakeClock';

const NOTES_URL = 'https://example.com/releases/latest';
const API_URL = 'https://api.example.com/repos/tasmota/releases/latest';

function releasePayload(tag: string = 'v12.4.0') {
  return {
    tag_name: tag,
    published_at: '2024-02-14T10:20:30Z',
    body: '- Added widgets',
    assets: [
      { name: 'tasmota-minimal.bin', browser_download_url: 'https://example.com/tasmota-minimal.bin' },
      { name: 'tasmota.bin', browser_download_url: 'https://example.com/tasmota.bin' },
    ],
  };
}

function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('parseReleasePayload', () => {
  test('extracts version, date, notes and the named asset', () => {
    expect(parseReleasePayload(releasePayload(), 'tasmota.bin', NOTES_URL)).toEqual({
      version: '12.4.0',
      releaseDate: '2024-02-14',
      releaseNotes: '- Added widgets',
      downloadUrl: 'https://example.com/tasmota.bin',
      releaseUrl: NOTES_URL,
    });
  });

  test('falls back to the first binary when the named asset is missing', () => {
    const release = parseReleasePayload(releasePayload(), 'tasmota32.bin', NOTES_URL);
    expect(release?.downloadUrl).toBe('https://example.com/tasmota-minimal.bin');
  });

  test('has no download url without assets', () => {
    const release = parseReleasePayload({ tag_name: 'v12.4.0' }, 'tasmota.bin', NOTES_URL);
    expect(release?.downloadUrl).toBeNull();
    expect(release?.releaseDate).toBe('');
  });

  test('rejects payloads without a usable tag', () => {
    expect(parseReleasePayload({ tag_name: 'nightly' }, 'tasmota.bin', NOTES_URL)).toBeNull();
    expect(parseReleasePayload({}, 'tasmota.bin', NOTES_URL)).toBeNull();
    expect(parseReleasePayload([], 'tasmota.bin', NOTES_URL)).toBeNull();
  });
});

describe('ReleaseResolver', () => {
  let mockFetch: jest.Mock;
  let originalFetch: typeof global.fetch;
  let clock: FakeClock;
  let resolver: ReleaseResolver;

  beforeEach(() => {
    originalFetch = global.fetch;
    mockFetch = jest.fn();
    global.fetch = mockFetch;
    clock = new FakeClock();
    resolver = new ReleaseResolver({
      apiUrl: API_URL,
      releaseNotesUrl: NOTES_URL,
      assetName: 'tasmota.bin',
      cacheTtlMs: 30 * 60 * 1000,
      fetchTimeoutMs: 1000,
      clock,
    });
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    global.fetch = originalFetch;
    jest.restoreAllMocks();
  });

  test('fetches and returns the latest release', async () => {
    mockFetch.mockResolvedValue(jsonResponse(releasePayload()));

    const result = await resolver.getLatestRelease();

    expect(result.ok).toBe(true);
    if (result.ok) expect(result.release.version).toBe('12.4.0');
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe(API_URL);
    expect(init.headers['User-Agent']).toBe('tasmota-fleet-updater');
  });

  test('serves repeated lookups from the cache within the TTL', async () => {
    mockFetch.mockResolvedValue(jsonResponse(releasePayload()));

    await resolver.getLatestRelease();
    clock.advance(29 * 60 * 1000);
    const second = await resolver.getLatestRelease();

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(second.ok).toBe(true);
  });

  test('shares one upstream request between concurrent lookups', async () => {
    mockFetch.mockResolvedValue(jsonResponse(releasePayload()));

    const [first, second] = await Promise.all([
      resolver.getLatestRelease(),
      resolver.getLatestRelease({ refresh: true }),
    ]);

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(first).toEqual(second);
    expect(first.ok).toBe(true);
  });

  test('fetches again after a concurrent failure settles', async () => {
    mockFetch
      .mockResolvedValueOnce(new Response('rate limited', { status: 403 }))
      .mockResolvedValueOnce(jsonResponse(releasePayload()));

    const [first, second] = await Promise.all([resolver.getLatestRelease(), resolver.getLatestRelease()]);
    const third = await resolver.getLatestRelease();

    expect(first.ok).toBe(false);
    expect(second.ok).toBe(false);
    expect(third.ok).toBe(true);
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  test('refetches once the TTL has elapsed', async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse(releasePayload('v12.4.0')))
      .mockResolvedValueOnce(jsonResponse(releasePayload('v12.5.0')));

    await resolver.getLatestRelease();
    clock.advance(30 * 60 * 1000);
    const second = await resolver.getLatestRelease();

    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(second.ok && second.release.version).toBe('12.5.0');
  });

  test('refresh bypasses the cache', async () => {
    mockFetch.mockResolvedValue(jsonResponse(releasePayload()));

    await resolver.getLatestRelease();
    await resolver.getLatestRelease({ refresh: true });

    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  test('invalidate drops the cached release', async () => {
    mockFetch.mockResolvedValue(jsonResponse(releasePayload()));

    await resolver.getLatestRelease();
    expect(resolver.getCached()?.version).toBe('12.4.0');
    resolver.invalidate();
    expect(resolver.getCached()).toBeNull();
  });

  test('reports HTTP errors without caching them', async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse({ message: 'rate limited' }, 403))
      .mockResolvedValueOnce(jsonResponse(releasePayload()));

    const first = await resolver.getLatestRelease();
    expect(first).toEqual({ ok: false, error: 'Release source answered HTTP 403' });

    const second = await resolver.getLatestRelease();
    expect(second.ok).toBe(true);
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  test('reports invalid JSON', async () => {
    mockFetch.mockResolvedValue(new Response('<html>', { status: 200 }));

    const result = await resolver.getLatestRelease();

    expect(result).toEqual({ ok: false, error: 'Release payload is not valid JSON' });
  });

  test('reports a payload without a version', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ tag_name: '' }));

    const result = await resolver.getLatestRelease();

    expect(result).toEqual({ ok: false, error: 'Release payload carries no usable version' });
  });

  test('reports network failures', async () => {
    mockFetch.mockRejectedValue(new Error('getaddrinfo ENOTFOUND api.example.com'));

    const result = await resolver.getLatestRelease();

    expect(result).toEqual({ ok: false, error: 'Release source unreachable: getaddrinfo ENOTFOUND api.example.com' });
  });
});
