import * as cheerio from 'cheerio';
import type { ChecklistScore, PageSnapshot } from '../types';
import { detectDeliveryPlatform } from '../crawler';
import { scoreCheck, summarizeChecklist } from './checklist';

export const WEBSITE_MAX_SCORE = 40;

const RESTAURANT_SCHEMA_TYPES = new Set([
  'Restaurant',
  'FoodEstablishment',
  'LocalBusiness',
  'CafeOrCoffeeShop',
  'FastFoodRestaurant',
  'BarOrPub',
  'Bakery',
]);

const MENU_SCHEMA_TYPES = new Set(['Menu', 'MenuSection', 'MenuItem']);

const PHONE_PATTERN = /(\+?1[\s.-]?)?\(?\d{3}\)?[\s.-]\d{3}[\s.-]\d{4}/;
const ORDER_TEXT_PATTERN = /\b(order online|order now|order pickup|order delivery|online ordering|start order)\b/i;

function collectSchemaTypes($: cheerio.CheerioAPI): Set<string> {
  const types = new Set<string>();
  const visit = (node: unknown) => {
    if (Array.isArray(node)) {
      node.forEach(visit);
      return;
    }
    if (!node || typeof node !== 'object') return;
    for (const [key, value] of Object.entries(node)) {
      if (key === '@type') {
        const list = Array.isArray(value) ? value : [value];
        list.forEach(t => {
          if (typeof t === 'string') types.add(t);
        });
      } else if (value && typeof value === 'object') {
        visit(value);
      }
    }
  };

  $('script[type="application/ld+json"]').each((_, el) => {
    try {
      visit(JSON.parse($(el).html() || ''));
    } catch {
      // ignore invalid JSON-LD blocks
      return;
    }
  });
  return types;
}

function lengthBandPoints(length: number, min: number, max: number, full: number, partial: number): number {
  if (length === 0) return 0;
  return length >= min && length <= max ? full : partial;
}

export function scoreWebsiteBasic(page: PageSnapshot | null): ChecklistScore {
  const $ = cheerio.load(page?.html ?? '');
  const reachable = page !== null && page.statusCode < 400;

  const finalUrl = page?.finalUrl ?? '';
  const isHttps = reachable && finalUrl.startsWith('https://');

  const title = reachable ? $('title').first().text().trim() : '';
  const description = reachable ? ($('meta[name="description"]').attr('content') ?? '').trim() : '';
  const h1Count = reachable ? $('h1').length : 0;
  const hasViewport = reachable && $('meta[name="viewport"]').length > 0;

  const schemaTypes = reachable ? collectSchemaTypes($) : new Set<string>();
  const restaurantSchema = Array.from(schemaTypes).filter(t => RESTAURANT_SCHEMA_TYPES.has(t));
  const hasMenuSchema = Array.from(schemaTypes).some(t => MENU_SCHEMA_TYPES.has(t));

  const anchors = reachable
    ? $('a[href]').toArray().map(el => ({ href: $(el).attr('href') ?? '', text: $(el).text().replace(/\s+/g, ' ').trim() }))
    : [];
  const hasMenuLink = anchors.some(a => /\bmenus?\b/i.test(a.text) || /\/menus?(\/|\.|-|$)/i.test(a.href));
  const hasOrderingLink = anchors.some(a => ORDER_TEXT_PATTERN.test(a.text) || detectDeliveryPlatform(safeResolve(a.href, finalUrl)) !== null);
  const hasPhone = reachable && (anchors.some(a => a.href.startsWith('tel:')) || PHONE_PATTERN.test($('body').text()));

  const missing = 'No reachable website';

  return summarizeChecklist([
    scoreCheck({
      check: 'Website reachable',
      points: reachable ? 6 : 0,
      maxPoints: 6,
      details: reachable ? `HTTP ${page?.statusCode} via ${page?.via} fetch` : page ? `HTTP ${page.statusCode}` : missing,
      recommendation: 'Make sure the website loads. A broken site linked from the listing costs more than having none.',
    }),
    scoreCheck({
      check: 'HTTPS',
      points: isHttps ? 4 : 0,
      maxPoints: 4,
      details: reachable ? (isHttps ? 'Served over HTTPS' : `Served from ${finalUrl}`) : missing,
      recommendation: 'Serve the site over HTTPS. Browsers flag plain HTTP pages as not secure.',
    }),
    scoreCheck({
      check: 'Title tag',
      points: lengthBandPoints(title.length, 10, 70, 4, 2),
      maxPoints: 4,
      details: title ? `"${title}" (${title.length} chars)` : 'No title tag',
      recommendation: 'Write a 10-70 character title with the restaurant name, cuisine and neighborhood.',
    }),
    scoreCheck({
      check: 'Meta description',
      points: lengthBandPoints(description.length, 50, 160, 4, 2),
      maxPoints: 4,
      details: description ? `${description.length} chars` : 'No meta description',
      recommendation: 'Add a 50-160 character meta description covering cuisine, signature dishes and ordering options.',
    }),
    scoreCheck({
      check: 'Single H1 heading',
      points: h1Count === 1 ? 3 : h1Count > 1 ? 1 : 0,
      maxPoints: 3,
      details: `${h1Count} H1 heading(s)`,
      recommendation: 'Use exactly one H1 heading that names the restaurant.',
    }),
    scoreCheck({
      check: 'Mobile viewport',
      points: hasViewport ? 4 : 0,
      maxPoints: 4,
      details: hasViewport ? 'Viewport meta tag present' : 'No viewport meta tag',
      recommendation: 'Add a responsive viewport meta tag. Most restaurant searches happen on phones.',
    }),
    scoreCheck({
      check: 'Restaurant structured data',
      points: restaurantSchema.length > 0 ? 5 : 0,
      maxPoints: 5,
      details: restaurantSchema.length > 0 ? `Found: ${restaurantSchema.join(', ')}` : 'No Restaurant JSON-LD',
      recommendation: 'Add Restaurant JSON-LD with address, phone, opening hours, cuisine and a menu link.',
    }),
    scoreCheck({
      check: 'Menu on site',
      points: hasMenuLink || hasMenuSchema ? 4 : 0,
      maxPoints: 4,
      details: hasMenuSchema ? 'Menu structured data found' : hasMenuLink ? 'Menu link found' : 'No menu link or menu data',
      recommendation: 'Publish the menu as an HTML page (not only a PDF or image) and link it from the homepage.',
    }),
    scoreCheck({
      check: 'Online ordering link',
      points: hasOrderingLink ? 3 : 0,
      maxPoints: 3,
      details: hasOrderingLink ? 'Ordering or delivery link found' : 'No ordering link',
      recommendation: 'Add a visible "Order online" button pointing at first-party ordering or your delivery storefronts.',
    }),
    scoreCheck({
      check: 'Phone number on page',
      points: hasPhone ? 3 : 0,
      maxPoints: 3,
      details: hasPhone ? 'Phone number found' : 'No phone number on the page',
      recommendation: 'Show a tap-to-call phone number (tel: link) in the header or footer.',
    }),
  ]);
}

function safeResolve(href: string, base: string): string {
  try {
    return new URL(href, base || undefined).toString();
  } catch {
    return href;
  }
}
