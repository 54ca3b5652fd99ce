import type { ChecklistScore, MenuItem, PricingScore } from '../types';
import { countMenuCategories } from '../menu/extract';
import { scoreCheck, summarizeChecklist } from './checklist';

export const MENU_MAX_SCORE = 30;
export const PRICING_MAX_SCORE = 30;

export const HEALTHY_MARKUP_MIN = 0.10;
export const HEALTHY_MARKUP_MAX = 0.35;

export function computeMenuStructureScore(items: MenuItem[]): ChecklistScore {
  const itemCount = items.length;
  const categories = countMenuCategories(items);
  const categoryCount = categories.size;

  const priced = items.filter(i => i.price !== null && i.price > 0);
  const priceCoverage = itemCount > 0 ? priced.length / itemCount : 0;

  const balanced = Array.from(categories.values()).filter(count => count >= 2 && count <= 20).length;
  const balanceRatio = categoryCount > 0 ? balanced / categoryCount : 0;

  const nameCounts = new Map<string, number>();
  for (const item of items) {
    const key = normalizeItemName(item.name);
    nameCounts.set(key, (nameCounts.get(key) ?? 0) + 1);
  }
  const duplicates = Array.from(nameCounts.values()).reduce((sum, n) => sum + (n - 1), 0);
  const duplicateRatio = itemCount > 0 ? duplicates / itemCount : 0;

  const prices = priced.map(i => i.price ?? 0);
  const minPrice = prices.length > 0 ? Math.min(...prices) : 0;
  const maxPrice = prices.length > 0 ? Math.max(...prices) : 0;
  const priceSpread = minPrice > 0 ? maxPrice / minPrice : 0;

  return summarizeChecklist([
    scoreCheck({
      check: 'Menu size',
      points: itemCount >= 15 ? 6 : itemCount >= 5 ? 3 : 0,
      maxPoints: 6,
      details: `${itemCount} item(s) found`,
      recommendation: itemCount === 0
        ? 'No menu could be read. Publish the menu as text on your website and delivery storefronts.'
        : 'List the full menu online. Thin menus look closed or incomplete to diners and to delivery-app search.',
    }),
    scoreCheck({
      check: 'Menu categories',
      points: categoryCount >= 4 ? 6 : categoryCount >= 2 ? 3 : 0,
      maxPoints: 6,
      details: `${categoryCount} categor${categoryCount === 1 ? 'y' : 'ies'}`,
      recommendation: 'Group dishes into clear sections (appetizers, mains, sides, drinks) so the menu is easy to scan.',
    }),
    scoreCheck({
      check: 'Price coverage',
      points: itemCount > 0 && priceCoverage >= 0.9 ? 6 : priceCoverage >= 0.6 ? 3 : 0,
      maxPoints: 6,
      details: `${priced.length} of ${itemCount} item(s) priced (${Math.round(priceCoverage * 100)}%)`,
      recommendation: 'Show a price next to every item. Missing prices reduce conversion on delivery apps.',
    }),
    scoreCheck({
      check: 'Balanced categories',
      points: categoryCount > 0 && balanceRatio === 1 ? 4 : balanceRatio >= 0.5 ? 2 : 0,
      maxPoints: 4,
      details: `${balanced} of ${categoryCount} categor${categoryCount === 1 ? 'y has' : 'ies have'} 2-20 items`,
      recommendation: 'Keep each section between 2 and 20 items. Split oversized sections and merge single-item ones.',
    }),
    scoreCheck({
      check: 'Unique item names',
      points: itemCount > 0 && duplicates === 0 ? 4 : itemCount > 0 && duplicateRatio < 0.1 ? 2 : 0,
      maxPoints: 4,
      details: `${duplicates} duplicate name(s)`,
      recommendation: 'Remove duplicated items or give variants distinct names (e.g. size or protein).',
    }),
    scoreCheck({
      check: 'Price ladder',
      points: priceSpread >= 2 ? 4 : priceSpread >= 1.5 ? 2 : 0,
      maxPoints: 4,
      details: prices.length > 0 ? `Prices from ${formatMoney(minPrice)} to ${formatMoney(maxPrice)}` : 'No prices found',
      recommendation: 'Offer entry-level and premium items so the menu covers more budgets and anchors higher-margin dishes.',
    }),
  ]);
}

export function normalizeItemName(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

function formatMoney(value: number): string {
  return `$${value.toFixed(2)}`;
}

function round(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

function indexByName(items: MenuItem[]): Map<string, number> {
  const index = new Map<string, number>();
  for (const item of items) {
    if (item.price === null || item.price <= 0) continue;
    const key = normalizeItemName(item.name);
    if (key && !index.has(key)) index.set(key, item.price);
  }
  return index;
}

export function computePricingScore(dineIn: MenuItem[], delivery: MenuItem[]): PricingScore {
  const dineInPrices = indexByName(dineIn);
  const deliveryPrices = indexByName(delivery);

  const markups: number[] = [];
  for (const [name, deliveryPrice] of deliveryPrices) {
    const dineInPrice = dineInPrices.get(name);
    if (dineInPrice === undefined) continue;
    markups.push((deliveryPrice - dineInPrice) / dineInPrice);
  }

  const matchedItems = markups.length;
  const coverage = deliveryPrices.size > 0 ? matchedItems / deliveryPrices.size : 0;

  const mean = matchedItems > 0 ? markups.reduce((s, m) => s + m, 0) / matchedItems : null;
  const averageMarkup = mean === null ? null : round(mean, 4);

  const stdDev = mean === null
    ? null
    : Math.sqrt(markups.reduce((s, m) => s + (m - mean) ** 2, 0) / matchedItems);

  const markupBand: PricingScore['markupBand'] = averageMarkup === null
    ? 'unknown'
    : averageMarkup < HEALTHY_MARKUP_MIN
      ? 'too-low'
      : averageMarkup > HEALTHY_MARKUP_MAX
        ? 'too-high'
        : 'healthy';

  const markupPct = averageMarkup === null ? '' : `${round(averageMarkup * 100, 1)}%`;
  const markupDetails: Record<PricingScore['markupBand'], string> = {
    unknown: 'No items matched between dine-in and delivery menus',
    'too-low': `Average delivery markup ${markupPct} is too low to cover platform commission`,
    healthy: `Average delivery markup ${markupPct}`,
    'too-high': `Average delivery markup ${markupPct} is too high and hurts delivery conversion`,
  };
  const markupRecommendation = markupBand === 'too-high'
    ? 'Bring delivery prices within 10-35% of dine-in prices. Large markups push diners to competitors on the same app.'
    : 'Raise delivery prices 10-35% over dine-in to offset platform commission, or negotiate a lower commission tier.';

  const checklist = summarizeChecklist([
    scoreCheck({
      check: 'Menu match coverage',
      points: coverage >= 0.5 ? 10 : coverage >= 0.2 ? 5 : 0,
      maxPoints: 10,
      details: `${matchedItems} of ${deliveryPrices.size} priced delivery item(s) matched to dine-in prices`,
      recommendation: 'Keep item names identical across the website menu and delivery storefronts so prices can be compared and kept in sync.',
    }),
    scoreCheck({
      check: 'Delivery markup',
      points: markupBand === 'healthy' ? 12 : 0,
      maxPoints: 12,
      details: markupDetails[markupBand],
      recommendation: markupBand === 'unknown'
        ? 'Publish both dine-in and delivery menus so the delivery markup can be checked.'
        : markupRecommendation,
    }),
    scoreCheck({
      check: 'Markup consistency',
      points: stdDev === null ? 0 : stdDev <= 0.05 ? 8 : stdDev <= 0.15 ? 4 : 0,
      maxPoints: 8,
      details: stdDev === null ? 'Not enough matched items' : `Markup spread ${round(stdDev * 100, 1)} percentage points`,
      recommendation: 'Apply one consistent markup rule across delivery items instead of ad hoc per-item prices.',
    }),
  ]);

  return { ...checklist, averageMarkup, matchedItems, markupBand };
}
