import { describe, it, expect, afterEach, vi } from 'vitest';
import { HTTP_USER_AGENT } from '../selectors';
import { FetchPageLoader } from './pageLoader';

const OPTS = { waitFor: '.sidearm-roster-player-name', navigationMs: 1_000, markerMs: 500 };
const PAGE = '<span class="sidearm-roster-player-name"><span>Jane</span></span>';

describe('FetchPageLoader', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the HTML when the marker is present', async () => {
    const fetchFn = vi.fn(async (_url: string, _init?: RequestInit) => new Response(PAGE));
    const loader = new FetchPageLoader(fetchFn);

    await expect(loader.load('https://example.test/roster', OPTS)).resolves.toBe(PAGE);
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fetchFn.mock.calls[0][0]).toBe('https://example.test/roster');
    expect(fetchFn.mock.calls[0][1]?.headers).toEqual({ 'User-Agent': HTTP_USER_AGENT });
  });

  it('gives the request the navigation and marker budgets combined', async () => {
    const timeout = vi.spyOn(AbortSignal, 'timeout');
    const loader = new FetchPageLoader(async () => new Response(PAGE));

    await loader.load('https://example.test/roster', OPTS);

    expect(timeout).toHaveBeenCalledWith(1_500);
  });

  it('rejects on an HTTP error status', async () => {
    const loader = new FetchPageLoader(
      async () => new Response('gone', { status: 404, statusText: 'Not Found' })
    );

    await expect(loader.load('https://example.test/roster', OPTS)).rejects.toThrow('HTTP 404 Not Found');
  });

  it('rejects when the marker element is missing', async () => {
    const loader = new FetchPageLoader(async () => new Response('<p>Maintenance</p>'));

    await expect(loader.load('https://example.test/roster', OPTS)).rejects.toThrow(
      'Marker .sidearm-roster-player-name not found'
    );
  });
});
