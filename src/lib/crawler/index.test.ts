import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { detectDeliveryPlatform, discoverRestaurantLinks, fetchPageWithFallback } from './index';

const LONG_PAGE = `<html><head><title>Golden Dumpling House</title></head><body>${'<p>Hand-folded dumplings.</p>'.repeat(30)}</body></html>`;
const SHORT_PAGE = '<html><body>Loading...</body></html>';

const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => new Response(LONG_PAGE));
const notBlocked = async () => false;

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal('fetch', fetchMock);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe('fetchPageWithFallback', () => {
  it('returns the direct fetch when the page is usable', async () => {
    fetchMock.mockResolvedValueOnce(new Response(LONG_PAGE));

    const page = await fetchPageWithFallback('https://golden-dumpling.test/', { isBlocked: notBlocked });

    expect(page?.via).toBe('direct');
    expect(page?.title).toBe('Golden Dumpling House');
    expect(page?.finalUrl).toBe('https://golden-dumpling.test/');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('retries through the proxy when the direct page is too short', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response(SHORT_PAGE))
      .mockResolvedValueOnce(new Response(LONG_PAGE));

    const page = await fetchPageWithFallback('https://golden-dumpling.test/menu', {
      isBlocked: notBlocked,
      proxyUrl: 'https://render.test/?target={url}',
    });

    expect(page?.via).toBe('proxy');
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fetchMock.mock.calls[1][0]).toBe('https://render.test/?target=https%3A%2F%2Fgolden-dumpling.test%2Fmenu');
  });

  it('retries through the proxy when the site refuses the request', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response(LONG_PAGE, { status: 403 }))
      .mockResolvedValueOnce(new Response(LONG_PAGE));

    const page = await fetchPageWithFallback('https://golden-dumpling.test/', {
      isBlocked: notBlocked,
      proxyUrl: 'https://render.test/?target={url}',
    });

    expect(page?.via).toBe('proxy');
    expect(page?.statusCode).toBe(200);
  });

  it('returns null when the direct fetch fails and no proxy is configured', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

    const page = await fetchPageWithFallback('https://golden-dumpling.test/', { isBlocked: notBlocked });

    expect(page).toBeNull();
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('returns null when both tiers fail', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response(SHORT_PAGE))
      .mockResolvedValueOnce(new Response('upstream error', { status: 502 }));

    const page = await fetchPageWithFallback('https://golden-dumpling.test/', {
      isBlocked: notBlocked,
      proxyUrl: 'https://render.test/?target={url}',
    });

    expect(page).toBeNull();
  });

  it('refuses blocked targets without fetching', async () => {
    const page = await fetchPageWithFallback('http://10.0.0.8/admin', { isBlocked: async () => true });

    expect(page).toBeNull();
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('skips invalid URLs', async () => {
    expect(await fetchPageWithFallback('not a url', { isBlocked: notBlocked })).toBeNull();
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe('discoverRestaurantLinks', () => {
  const html = `<html><body>
    <a href="/menu">Menu</a>
    <a href="/menu?lang=en">Menu (EN)</a>
    <a href="/menus/dinner.pdf">Dinner PDF</a>
    <a href="/about">About us</a>
    <a href="/order">Order online</a>
    <a href="https://www.doordash.com/store/golden-1#top">DoorDash</a>
    <a href="https://other.test/menu">Menu</a>
    <a href="mailto:hello@golden-dumpling.test">Email</a>
  </body></html>`;

  it('ranks same-site menu links and collects delivery storefronts', () => {
    const links = discoverRestaurantLinks('https://golden-dumpling.test/', html);

    expect(links.menuLinks).toEqual([
      'https://golden-dumpling.test/menu',
      'https://golden-dumpling.test/menus/dinner.pdf',
    ]);
    expect(links.deliveryLinks).toEqual([
      { url: 'https://www.doordash.com/store/golden-1', platform: 'doordash' },
    ]);
    expect(links.orderingLinks).toEqual([
      'https://golden-dumpling.test/order',
      'https://www.doordash.com/store/golden-1',
    ]);
  });

  it('returns empty lists for a page without links', () => {
    expect(discoverRestaurantLinks('https://golden-dumpling.test/', '<p>Closed for renovation</p>')).toEqual({
      menuLinks: [],
      deliveryLinks: [],
      orderingLinks: [],
    });
  });
});

describe('detectDeliveryPlatform', () => {
  it('matches platform hosts and their subdomains', () => {
    expect(detectDeliveryPlatform('https://www.ubereats.com/store/golden')).toBe('ubereats');
    expect(detectDeliveryPlatform('https://order.grubhub.com/golden')).toBe('grubhub');
  });

  it('ignores lookalike hosts and invalid URLs', () => {
    expect(detectDeliveryPlatform('https://notdoordash.com/store')).toBeNull();
    expect(detectDeliveryPlatform('doordash')).toBeNull();
  });
});
