import * as cheerio from 'cheerio';
import type { DeliveryMenuSource, DeliveryPlatform, PageSnapshot } from '../types';
import { isBlockedTarget } from './network-guard';

const USER_AGENT = 'Mozilla/5.0 (compatible; Dinerscope/1.0; restaurant online-health check)';
const PAGE_TIMEOUT_MS = 15000;
const PROXY_TIMEOUT_MS = 60000;
const MIN_HTML_LENGTH = 500;
const MAX_MENU_LINKS = 5;

const DELIVERY_HOSTS: Array<{ pattern: RegExp; platform: DeliveryPlatform }> = [
  { pattern: /(^|\.)doordash\.com$/, platform: 'doordash' },
  { pattern: /(^|\.)ubereats\.com$/, platform: 'ubereats' },
  { pattern: /(^|\.)grubhub\.com$/, platform: 'grubhub' },
  { pattern: /(^|\.)postmates\.com$/, platform: 'postmates' },
  { pattern: /(^|\.)seamless\.com$/, platform: 'seamless' },
];

const MENU_PATH_PATTERN = /\/(menus?|food|drinks|carta|dinner|lunch|brunch|dishes)(\/|\.|-|$)/i;
const MENU_TEXT_PATTERN = /\b(menus?|our food|food & drinks?|dinner|lunch)\b/i;
const ORDER_PATTERN = /\b(order online|order now|order pickup|order delivery|online ordering|start order)\b/i;

export interface FetchFallbackOptions {
  proxyUrl?: string | null;
  minHtmlLength?: number;
  isBlocked?: (url: URL) => Promise<boolean>;
}

export interface RestaurantLinks {
  menuLinks: string[];
  deliveryLinks: DeliveryMenuSource[];
  orderingLinks: string[];
}

export async function crawlPage(url: string): Promise<PageSnapshot> {
  const start = Date.now();
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), PAGE_TIMEOUT_MS);

  try {
    const response = await fetch(url, {
      headers: {
        'User-Agent': USER_AGENT,
        'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      },
      signal: controller.signal,
      redirect: 'follow',
    });

    const html = await response.text();
    const loadTime = Date.now() - start;
    const $ = cheerio.load(html);
    const title = $('title').text().trim();

    return {
      url,
      finalUrl: response.url || url,
      html,
      title,
      statusCode: response.status,
      loadTime,
      via: 'direct',
    };
  } finally {
    clearTimeout(timeout);
  }
}

export async function fetchViaProxy(url: string, proxyTemplate: string): Promise<PageSnapshot> {
  const start = Date.now();
  const proxyUrl = proxyTemplate.replace('{url}', encodeURIComponent(url));
  const response = await fetch(proxyUrl, {
    headers: { 'Accept': 'text/html,application/xhtml+xml' },
    signal: AbortSignal.timeout(PROXY_TIMEOUT_MS),
  });
  const html = await response.text();
  const $ = cheerio.load(html);

  return {
    url,
    finalUrl: url,
    html,
    title: $('title').text().trim(),
    statusCode: response.status,
    loadTime: Date.now() - start,
    via: 'proxy',
  };
}

function isUsable(page: PageSnapshot, minHtmlLength: number): boolean {
  return page.statusCode < 400 && page.html.length > minHtmlLength;
}

/**
 * Plain request first, then the rendering proxy when one is configured.
 * Resolves to null when every tier fails; callers treat that as "no page".
 */
export async function fetchPageWithFallback(url: string, options: FetchFallbackOptions = {}): Promise<PageSnapshot | null> {
  const minHtmlLength = options.minHtmlLength ?? MIN_HTML_LENGTH;
  const isBlocked = options.isBlocked ?? isBlockedTarget;

  let target: URL;
  try {
    target = new URL(url);
  } catch {
    console.warn(`[Crawler] Skipping invalid URL: ${url}`);
    return null;
  }

  if (await isBlocked(target)) {
    console.warn(`[Crawler] Refusing private/internal target: ${target.hostname}`);
    return null;
  }

  try {
    const page = await crawlPage(url);
    if (isUsable(page, minHtmlLength)) return page;
    console.warn(`[Crawler] Direct fetch unusable for ${url}: HTTP ${page.statusCode}, ${page.html.length} chars`);
  } catch (error) {
    console.warn(`[Crawler] Direct fetch failed for ${url}:`, error);
  }

  if (!options.proxyUrl) return null;

  try {
    const page = await fetchViaProxy(url, options.proxyUrl);
    if (isUsable(page, minHtmlLength)) return page;
    console.warn(`[Crawler] Proxy fetch unusable for ${url}: HTTP ${page.statusCode}`);
  } catch (error) {
    console.warn(`[Crawler] Proxy fetch failed for ${url}:`, error);
  }

  return null;
}

export function detectDeliveryPlatform(url: string): DeliveryPlatform | null {
  let hostname: string;
  try {
    hostname = new URL(url).hostname.toLowerCase();
  } catch {
    return null;
  }
  return DELIVERY_HOSTS.find(entry => entry.pattern.test(hostname))?.platform ?? null;
}

export function discoverRestaurantLinks(baseUrl: string, html: string): RestaurantLinks {
  const base = new URL(baseUrl);
  const $ = cheerio.load(html);
  const menuCandidates = new Map<string, number>();
  const deliveryLinks = new Map<string, DeliveryMenuSource>();
  const orderingLinks = new Set<string>();

  $('a[href]').each((_, el) => {
    const href = $(el).attr('href');
    if (!href) return;

    let resolved: URL;
    try {
      resolved = new URL(href, baseUrl);
    } catch {
      return;
    }
    if (!['http:', 'https:'].includes(resolved.protocol)) return;
    resolved.hash = '';

    const text = $(el).text().replace(/\s+/g, ' ').trim();
    const platform = detectDeliveryPlatform(resolved.toString());
    if (platform) {
      deliveryLinks.set(resolved.toString(), { url: resolved.toString(), platform });
      orderingLinks.add(resolved.toString());
      return;
    }

    if (ORDER_PATTERN.test(text)) {
      orderingLinks.add(resolved.toString());
    }

    if (resolved.origin !== base.origin) return;
    const priority = menuLinkPriority(resolved.pathname, text);
    if (priority <= 0) return;

    resolved.search = '';
    const key = resolved.toString();
    menuCandidates.set(key, Math.max(priority, menuCandidates.get(key) ?? 0));
  });

  const menuLinks = Array.from(menuCandidates.entries())
    .sort((a, b) => b[1] - a[1])
    .map(([url]) => url)
    .slice(0, MAX_MENU_LINKS);

  return {
    menuLinks,
    deliveryLinks: Array.from(deliveryLinks.values()),
    orderingLinks: Array.from(orderingLinks),
  };
}

function menuLinkPriority(pathname: string, text: string): number {
  const path = pathname.toLowerCase();
  let priority = 0;

  if (MENU_PATH_PATTERN.test(path)) priority += 10;
  if (MENU_TEXT_PATTERN.test(text)) priority += 6;
  if (priority === 0) return 0;

  // PDF and image menus cannot be parsed as HTML
  if (/\.(pdf|jpe?g|png|webp)$/.test(path)) priority -= 8;
  if (/\/(wine|cocktail|bar)/.test(path)) priority -= 2;

  const depth = path.split('/').filter(Boolean).length;
  priority -= depth * 0.5;

  return priority;
}
