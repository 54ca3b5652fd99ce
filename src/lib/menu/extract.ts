import * as cheerio from 'cheerio';
import { MAX_MENU_ITEMS, type MenuChannel, type MenuItem } from '../types';

const PRICE_PATTERN = /(?:\$|€|£|US\$)\s*(\d{1,3}(?:,\d{3})+(?:\.\d{1,2})?(?!\d)|\d{1,4}(?:[.,]\d{1,2})?)/;
const DEFAULT_CATEGORY = 'Menu';
const MAX_NAME_LENGTH = 80;

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function normalizeSpace(input: string): string {
  return input.replace(/\s+/g, ' ').trim();
}

// "1,250.00" groups thousands, "1.250,00" and "9,90" use a decimal comma.
function parseAmount(raw: string): number | null {
  let normalized: string;
  if (/^\d{1,3}(?:,\d{3})+(?:\.\d+)?$/.test(raw)) {
    normalized = raw.replace(/,/g, '');
  } else if (/^\d{1,3}(?:\.\d{3})+,\d{1,2}$/.test(raw)) {
    normalized = raw.replace(/\./g, '').replace(',', '.');
  } else {
    normalized = raw.replace(',', '.');
  }
  const value = Number.parseFloat(normalized);
  return Number.isFinite(value) && value > 0 ? value : null;
}

export function parsePrice(text: string): number | null {
  const match = PRICE_PATTERN.exec(text);
  if (!match) return null;
  return parseAmount(match[1]);
}

function parseOfferPrice(offers: unknown): number | null {
  const list = Array.isArray(offers) ? offers : [offers];
  for (const offer of list) {
    if (!isObject(offer)) continue;
    const price = offer.price;
    if (typeof price === 'number' && price > 0) return price;
    if (typeof price === 'string') {
      const value = parseAmount(price.replace(/[^0-9.,]/g, ''));
      if (value !== null) return value;
    }
  }
  return null;
}

function typesOf(node: JsonObject): string[] {
  const type = node['@type'];
  if (typeof type === 'string') return [type];
  if (Array.isArray(type)) return type.filter((t): t is string => typeof t === 'string');
  return [];
}

function walkJsonLd(node: unknown, section: string, channel: MenuChannel, out: MenuItem[]) {
  if (Array.isArray(node)) {
    node.forEach(child => walkJsonLd(child, section, channel, out));
    return;
  }
  if (!isObject(node)) return;

  const types = typesOf(node);
  const name = typeof node.name === 'string' ? normalizeSpace(node.name) : '';

  if (types.includes('MenuItem') && name) {
    out.push({ name, price: parseOfferPrice(node.offers), category: section, channel });
  }

  const nextSection = types.includes('MenuSection') && name ? name : section;
  for (const key of ['@graph', 'hasMenu', 'hasMenuSection', 'hasMenuItem']) {
    if (key in node) walkJsonLd(node[key], nextSection, channel, out);
  }
}

export function extractJsonLdMenuItems($: cheerio.CheerioAPI, channel: MenuChannel): MenuItem[] {
  const items: MenuItem[] = [];
  $('script[type="application/ld+json"]').each((_, el) => {
    const raw = $(el).html();
    if (!raw) return;
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return;
    }
    walkJsonLd(parsed, DEFAULT_CATEGORY, channel, items);
  });
  return items;
}

function cleanItemName(text: string): string {
  return text.replace(/[\s.\-–—|:·…]+$/u, '').replace(/^[\s\-–—•*·]+/u, '').trim();
}

function extractDomMenuItems($: cheerio.CheerioAPI, channel: MenuChannel): MenuItem[] {
  const items: MenuItem[] = [];
  let category = DEFAULT_CATEGORY;

  $('body').find('h1, h2, h3, h4, h5, li, p, tr, dt, dd').each((_, el) => {
    const node = $(el);
    const text = normalizeSpace(node.text());
    if (!text) return;

    const isHeading = /^h[1-5]$/.test(el.tagName.toLowerCase());
    const match = PRICE_PATTERN.exec(text);

    if (isHeading && !match) {
      if (text.length <= 60) category = text;
      return;
    }
    if (!match) return;
    // Containers are skipped so nested price lines are read once
    if (!isHeading && node.find('li, p, tr, dt, dd').length > 0) return;

    const name = cleanItemName(text.slice(0, match.index));
    if (name.length < 2 || name.length > MAX_NAME_LENGTH) return;

    items.push({ name, price: parsePrice(match[0]), category, channel });
  });

  return items;
}

function dedupe(items: MenuItem[]): MenuItem[] {
  const seen = new Set<string>();
  return items.filter(item => {
    const key = `${item.name.toLowerCase()}|${item.price ?? ''}|${item.category.toLowerCase()}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export function extractMenuItems(html: string, channel: MenuChannel): MenuItem[] {
  const $ = cheerio.load(html);
  const structured = extractJsonLdMenuItems($, channel);
  const items = structured.length > 0 ? structured : extractDomMenuItems($, channel);
  return dedupe(items).slice(0, MAX_MENU_ITEMS);
}

export function countMenuCategories(items: MenuItem[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const item of items) {
    const key = item.category.trim() || DEFAULT_CATEGORY;
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}
