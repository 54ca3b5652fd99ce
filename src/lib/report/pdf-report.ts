import { load as loadHtml, type CheerioAPI, type Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import MarkdownIt from 'markdown-it';
import {
  PDFDocument,
  PDFFont,
  PDFPage,
  StandardFonts,
  rgb,
  type RGB,
} from 'pdf-lib';
import { renderDeepAnalysisMarkdown } from '@/lib/analyzers/deep-analysis-markdown';
import {
  CHECKLIST_LABELS,
  RANK_BUCKET_LABELS,
  type ChecklistKey,
  type ChecklistScore,
  type Diagnosis,
  type Finding,
  type Recommendation,
} from '@/lib/types';

const PAGE_WIDTH = 595.28; // A4
const PAGE_HEIGHT = 841.89;
const PAGE_MARGIN_X = 46;
const PAGE_MARGIN_TOP = 44;
const PAGE_MARGIN_BOTTOM = 46;
const CONTENT_WIDTH = PAGE_WIDTH - PAGE_MARGIN_X * 2;
const PAGE_HEADER_HEIGHT = 26;

const COLOR_TEXT = rgb(0.11, 0.13, 0.18);
const COLOR_MUTED = rgb(0.39, 0.44, 0.52);
const COLOR_BORDER = rgb(0.87, 0.89, 0.93);
const COLOR_BRAND = rgb(0.72, 0.27, 0.09);
const COLOR_BRAND_SOFT = rgb(0.99, 0.96, 0.93);
const COLOR_GOOD = rgb(0.11, 0.57, 0.27);
const COLOR_WARN = rgb(0.69, 0.39, 0.06);
const COLOR_BAD = rgb(0.66, 0.16, 0.15);

const REPORT_NAME = 'Dinerscope Restaurant Health Report';
const CHECKLIST_ORDER: ChecklistKey[] = ['profile', 'website', 'menu', 'pricing'];

const CHECKLIST_SUBTITLES: Record<ChecklistKey, string> = {
  profile: 'Completeness of the Google Business Profile listing.',
  website: 'Basic on-page signals of the restaurant website.',
  menu: 'Size, sections and pricing of the dine-in menu.',
  pricing: 'Delivery prices compared against dine-in prices for the same items.',
};

const PDF_CHAR_REPLACEMENTS: Record<string, string> = {
  '→': '->',
  '←': '<-',
  '⇒': '=>',
  '…': '...',
  '—': '-',
  '–': '-',
  '−': '-',
  '“': '"',
  '”': '"',
  '‘': "'",
  '’': "'",
  '✓': '[ok]',
  '✗': '[x]',
  '≤': '<=',
  '≥': '>=',
  '≈': '~',
  '\u00A0': ' ',
};

type FontKey = 'body' | 'bold';

type PdfFonts = Record<FontKey, PDFFont>;

type FontSupport = Record<FontKey, Set<number>>;

type ReportContext = {
  doc: PDFDocument;
  fonts: PdfFonts;
  support: FontSupport;
  page: PDFPage;
  y: number;
  restaurant: string;
};

type DrawTextOptions = {
  font?: FontKey;
  size?: number;
  color?: RGB;
  indent?: number;
  lineHeight?: number;
  after?: number;
  before?: number;
  maxWidth?: number;
};

function normalizeSpace(input: string): string {
  return input.replace(/\s+/g, ' ').trim();
}

function slugify(input: string): string {
  const slug = input
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, 60)
    .replace(/-+$/, '');
  return slug || 'restaurant';
}

function toDateStamp(value: string): string {
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) return 'unknown-date';
  return parsed.toISOString().slice(0, 10);
}

function toUtcDateTime(value: string): string {
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) return value;
  return `${parsed.toISOString().replace('T', ' ').slice(0, 19)} UTC`;
}

function formatMoney(value: number): string {
  return `$${value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;
}

export function buildReportFilename(restaurantName: string, diagnosedAt: string): string {
  return `dinerscope-report-${slugify(restaurantName)}-${toDateStamp(diagnosedAt)}.pdf`;
}

async function embedFonts(doc: PDFDocument): Promise<PdfFonts> {
  return {
    body: await doc.embedFont(StandardFonts.Helvetica),
    bold: await doc.embedFont(StandardFonts.HelveticaBold),
  };
}

function createFontSupport(fonts: PdfFonts): FontSupport {
  return {
    body: new Set(fonts.body.getCharacterSet()),
    bold: new Set(fonts.bold.getCharacterSet()),
  };
}

// Standard fonts only cover WinAnsi; anything else is mapped or replaced.
function sanitizeForFont(text: string, support: Set<number>): string {
  let normalized = text.normalize('NFKD');

  for (const [search, replacement] of Object.entries(PDF_CHAR_REPLACEMENTS)) {
    normalized = normalized.split(search).join(replacement);
  }

  normalized = normalized.replace(/[\u0300-\u036f]/g, '');

  let result = '';
  for (const ch of normalized) {
    if (ch === '\n' || ch === '\r' || ch === '\t') {
      result += ch;
      continue;
    }

    if (support.has(ch.codePointAt(0) ?? 0)) {
      result += ch;
      continue;
    }

    const code = ch.charCodeAt(0);
    result += code >= 0x20 && code <= 0x7e ? ch : '?';
  }

  return result;
}

function drawPageHeader(ctx: ReportContext) {
  const headerY = PAGE_HEIGHT - PAGE_MARGIN_TOP;

  ctx.page.drawLine({
    start: { x: PAGE_MARGIN_X, y: headerY - 15 },
    end: { x: PAGE_WIDTH - PAGE_MARGIN_X, y: headerY - 15 },
    thickness: 0.7,
    color: COLOR_BORDER,
  });

  const left = sanitizeForFont(REPORT_NAME, ctx.support.bold);
  const right = sanitizeForFont(ctx.restaurant, ctx.support.body);

  ctx.page.drawText(left, {
    x: PAGE_MARGIN_X,
    y: headerY - 6,
    font: ctx.fonts.bold,
    size: 10,
    color: COLOR_BRAND,
  });

  const rightSize = 9;
  const rightWidth = ctx.fonts.body.widthOfTextAtSize(right, rightSize);
  ctx.page.drawText(right, {
    x: PAGE_WIDTH - PAGE_MARGIN_X - rightWidth,
    y: headerY - 6,
    font: ctx.fonts.body,
    size: rightSize,
    color: COLOR_MUTED,
  });
}

function createPage(ctx: ReportContext) {
  ctx.page = ctx.doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
  drawPageHeader(ctx);
  ctx.y = PAGE_HEIGHT - PAGE_MARGIN_TOP - PAGE_HEADER_HEIGHT;
}

function ensureSpace(ctx: ReportContext, neededHeight: number) {
  if (ctx.y - neededHeight >= PAGE_MARGIN_BOTTOM) return;
  createPage(ctx);
}

function wrapLine(text: string, font: PDFFont, size: number, maxWidth: number): string[] {
  const normalized = text.replace(/\t/g, '  ').replace(/\s+/g, ' ').trim();
  if (!normalized) return [''];

  const words = normalized.split(' ');
  const lines: string[] = [];
  let current = words[0] ?? '';

  const fitWord = (word: string): string[] => {
    const parts: string[] = [];
    let segment = '';
    for (const ch of word) {
      const candidate = `${segment}${ch}`;
      if (segment && font.widthOfTextAtSize(candidate, size) > maxWidth) {
        parts.push(segment);
        segment = ch;
      } else {
        segment = candidate;
      }
    }
    if (segment) parts.push(segment);
    return parts;
  };

  for (let i = 1; i < words.length; i++) {
    const nextWord = words[i];
    const candidate = `${current} ${nextWord}`;

    if (font.widthOfTextAtSize(candidate, size) <= maxWidth) {
      current = candidate;
      continue;
    }

    if (font.widthOfTextAtSize(nextWord, size) > maxWidth) {
      lines.push(current);
      const chunks = fitWord(nextWord);
      for (let c = 0; c < chunks.length - 1; c++) lines.push(chunks[c]);
      current = chunks[chunks.length - 1] ?? '';
      continue;
    }

    lines.push(current);
    current = nextWord;
  }

  lines.push(current);
  return lines;
}

function drawTextBlock(ctx: ReportContext, text: string, options: DrawTextOptions = {}) {
  const {
    font = 'body',
    size = 10.5,
    color = COLOR_TEXT,
    indent = 0,
    lineHeight = size + 3.5,
    after = 0,
    before = 0,
    maxWidth = CONTENT_WIDTH - indent,
  } = options;

  if (before > 0) {
    ensureSpace(ctx, before + 2);
    ctx.y -= before;
  }

  const pdfFont = ctx.fonts[font];
  const safe = sanitizeForFont(text, ctx.support[font]);
  const paragraphs = safe.replace(/\r/g, '').split('\n');

  for (const paragraph of paragraphs) {
    if (!paragraph.trim()) {
      ensureSpace(ctx, lineHeight * 0.6);
      ctx.y -= lineHeight * 0.6;
      continue;
    }

    for (const line of wrapLine(paragraph, pdfFont, size, maxWidth)) {
      ensureSpace(ctx, lineHeight + 2);
      ctx.page.drawText(line, {
        x: PAGE_MARGIN_X + indent,
        y: ctx.y,
        size,
        font: pdfFont,
        color,
      });
      ctx.y -= lineHeight;
    }
  }

  if (after > 0) {
    ensureSpace(ctx, after + 2);
    ctx.y -= after;
  }
}

function drawRule(ctx: ReportContext, after = 8) {
  ensureSpace(ctx, 8 + after);
  const y = ctx.y - 2;

  ctx.page.drawLine({
    start: { x: PAGE_MARGIN_X, y },
    end: { x: PAGE_WIDTH - PAGE_MARGIN_X, y },
    thickness: 0.7,
    color: COLOR_BORDER,
  });

  ctx.y = y - after;
}

function drawSectionHeading(ctx: ReportContext, title: string, subtitle?: string) {
  drawTextBlock(ctx, title, {
    font: 'bold',
    size: 16,
    color: COLOR_BRAND,
    lineHeight: 20,
    before: 8,
    after: 2,
  });

  if (subtitle) {
    drawTextBlock(ctx, subtitle, {
      size: 10,
      color: COLOR_MUTED,
      lineHeight: 14,
      after: 3,
    });
  }

  drawRule(ctx, 8);
}

function drawLabelledRows(ctx: ReportContext, rows: Array<[string, string]>, labelWidth = 110) {
  for (const [label, value] of rows) {
    drawTextBlock(ctx, `${label}:`, {
      font: 'bold',
      size: 10.5,
      lineHeight: 14,
      maxWidth: labelWidth - 2,
    });

    ctx.y += 14;

    drawTextBlock(ctx, value, {
      size: 10.5,
      indent: labelWidth,
      lineHeight: 14,
      maxWidth: CONTENT_WIDTH - labelWidth,
      after: 1,
    });
  }
}

function scoreColor(percent: number): RGB {
  if (percent >= 70) return COLOR_GOOD;
  if (percent >= 50) return COLOR_WARN;
  return COLOR_BAD;
}

function drawMetricCard(
  ctx: ReportContext,
  x: number,
  y: number,
  title: string,
  score: number,
  maxScore: number,
  grade: string,
) {
  const width = 155;
  const height = 70;
  const percent = maxScore > 0 ? (score / maxScore) * 100 : 0;

  ctx.page.drawRectangle({
    x,
    y: y - height,
    width,
    height,
    color: COLOR_BRAND_SOFT,
    borderColor: COLOR_BORDER,
    borderWidth: 0.8,
  });

  ctx.page.drawText(sanitizeForFont(title, ctx.support.bold), {
    x: x + 10,
    y: y - 18,
    font: ctx.fonts.bold,
    size: 10,
    color: COLOR_MUTED,
  });

  ctx.page.drawText(`${score}/${maxScore}`, {
    x: x + 10,
    y: y - 40,
    font: ctx.fonts.bold,
    size: 17,
    color: scoreColor(percent),
  });

  ctx.page.drawText(`Grade ${grade}`, {
    x: x + 10,
    y: y - 57,
    font: ctx.fonts.body,
    size: 10,
    color: COLOR_TEXT,
  });
}

function drawCover(ctx: ReportContext, diagnosis: Diagnosis) {
  const { place, checklists } = diagnosis;

  drawTextBlock(ctx, REPORT_NAME, {
    font: 'bold',
    size: 24,
    color: COLOR_BRAND,
    lineHeight: 30,
    after: 6,
  });

  drawTextBlock(ctx, place.name || diagnosis.query, {
    font: 'bold',
    size: 15,
    lineHeight: 20,
  });

  drawTextBlock(
    ctx,
    `Generated ${toDateStamp(diagnosis.diagnosedAt)} | "${diagnosis.localRank.keyword}" rank: ${RANK_BUCKET_LABELS[diagnosis.localRank.bucket]}`,
    {
      size: 10.5,
      color: COLOR_MUTED,
      lineHeight: 14,
      after: 8,
    }
  );

  ensureSpace(ctx, 90);
  const rowY = ctx.y;
  drawMetricCard(ctx, PAGE_MARGIN_X, rowY, 'Overall Score', diagnosis.overallScore, 100, diagnosis.overallGrade);
  drawMetricCard(ctx, PAGE_MARGIN_X + 172, rowY, CHECKLIST_LABELS.profile, checklists.profile.score, checklists.profile.maxScore, checklists.profile.grade);
  drawMetricCard(ctx, PAGE_MARGIN_X + 344, rowY, CHECKLIST_LABELS.website, checklists.website.score, checklists.website.maxScore, checklists.website.grade);
  ctx.y -= 84;

  drawRule(ctx, 10);
}

function drawSummary(ctx: ReportContext, diagnosis: Diagnosis) {
  drawSectionHeading(ctx, 'Summary');

  const { place } = diagnosis;
  const rows: Array<[string, string]> = [
    ['Business', place.name || '(unnamed listing)'],
    ['Address', place.formattedAddress ?? 'Not listed'],
    ['Phone', place.formattedPhoneNumber ?? 'Not listed'],
    ['Website', place.website ?? 'Not listed'],
    ['Rating', place.rating === null ? 'No rating' : `${place.rating.toFixed(1)} (${place.userRatingsTotal ?? 0} reviews)`],
    ['Generated', toUtcDateTime(diagnosis.diagnosedAt)],
    ['Overall', `${diagnosis.overallScore}/100 (${diagnosis.overallGrade})`],
  ];

  for (const key of CHECKLIST_ORDER) {
    const checklist = diagnosis.checklists[key];
    rows.push([CHECKLIST_LABELS[key], `${checklist.score}/${checklist.maxScore} (${checklist.grade})`]);
  }

  drawLabelledRows(ctx, rows);
}

function drawRevenue(ctx: ReportContext, diagnosis: Diagnosis) {
  const { revenue, localRank } = diagnosis;
  drawSectionHeading(
    ctx,
    'Estimated Revenue Impact',
    'Hypothetical estimate from search volume, click-through, conversion and average order value.',
  );

  drawLabelledRows(ctx, [
    ['Keyword', `"${localRank.keyword}"`],
    ['Local position', localRank.position === null ? `Not found in ${localRank.resultsChecked} results` : `#${localRank.position}`],
    ['Rank bucket', RANK_BUCKET_LABELS[localRank.bucket]],
    ['Search volume', `${revenue.monthlySearchVolume.toLocaleString('en-US')} / month`],
    ['Average order', formatMoney(revenue.averageOrderValue)],
    ['Lost customers', `${revenue.lostCustomers} / month`],
    ['Monthly loss', formatMoney(revenue.monthlyLoss)],
    ['Annual loss', formatMoney(revenue.annualLoss)],
  ]);
}

function drawCompetitors(ctx: ReportContext, diagnosis: Diagnosis) {
  const { reputation, competitors } = diagnosis;
  drawSectionHeading(ctx, 'Competitor Benchmark', `Status: ${reputation.status}`);

  if (competitors.length === 0) {
    drawTextBlock(ctx, 'No nearby competitors were found.', { color: COLOR_MUTED, after: 4 });
    return;
  }

  drawLabelledRows(ctx, [
    ['Your rating', reputation.yourRating === null ? 'No rating' : reputation.yourRating.toFixed(1)],
    ['Median rating', reputation.competitorMedianRating === null ? 'n/a' : reputation.competitorMedianRating.toFixed(2)],
    ['Your reviews', String(reputation.yourReviews)],
    ['Median reviews', String(reputation.competitorMedianReviews)],
  ]);

  competitors.forEach((competitor, index) => {
    const rating = competitor.rating === null ? 'no rating' : `${competitor.rating.toFixed(1)} stars`;
    const distance = competitor.distanceMeters === null ? '' : ` | ${competitor.distanceMeters} m`;
    drawTextBlock(ctx, `${index + 1}. ${competitor.name}`, {
      font: 'bold',
      size: 10.5,
      lineHeight: 14,
      before: index === 0 ? 4 : 1,
    });
    drawTextBlock(ctx, `${rating} | ${competitor.reviews} reviews${distance}`, {
      size: 9.8,
      color: COLOR_MUTED,
      indent: 12,
      lineHeight: 13,
    });
  });
}

function priorityColor(priority: Recommendation['priority']): RGB {
  if (priority === 'critical') return COLOR_BAD;
  if (priority === 'high') return COLOR_WARN;
  if (priority === 'medium') return rgb(0.74, 0.52, 0.1);
  return COLOR_GOOD;
}

function drawRecommendations(ctx: ReportContext, diagnosis: Diagnosis) {
  drawSectionHeading(
    ctx,
    'Top Recommendations',
    `Total: ${diagnosis.topRecommendations.length} actions ranked by points available`,
  );

  if (diagnosis.topRecommendations.length === 0) {
    drawTextBlock(ctx, 'Every check passed. No recommendations.', { color: COLOR_MUTED, after: 4 });
    return;
  }

  for (const recommendation of diagnosis.topRecommendations) {
    drawTextBlock(
      ctx,
      `${recommendation.title} [${recommendation.priority.toUpperCase()} | effort: ${recommendation.effort}]`,
      {
        font: 'bold',
        size: 11.5,
        color: priorityColor(recommendation.priority),
        lineHeight: 15,
        before: 4,
      }
    );

    drawTextBlock(ctx, `${CHECKLIST_LABELS[recommendation.checklist]} / ${recommendation.check} (+${recommendation.pointsAvailable} pts)`, {
      size: 10,
      color: COLOR_MUTED,
      lineHeight: 13.5,
    });

    drawTextBlock(ctx, normalizeSpace(recommendation.description), {
      size: 10,
      lineHeight: 13.5,
      after: 2,
    });

    drawRule(ctx, 5);
  }
}

function findingStatusColor(status: Finding['status']): RGB {
  if (status === 'pass') return COLOR_GOOD;
  if (status === 'partial') return COLOR_WARN;
  return COLOR_BAD;
}

function drawChecklist(ctx: ReportContext, key: ChecklistKey, checklist: ChecklistScore) {
  drawSectionHeading(
    ctx,
    `${CHECKLIST_LABELS[key]}: ${checklist.score}/${checklist.maxScore}`,
    CHECKLIST_SUBTITLES[key],
  );

  for (const finding of checklist.findings) {
    drawTextBlock(
      ctx,
      `[${finding.status.toUpperCase()}] ${finding.check} (${finding.points}/${finding.maxPoints})`,
      {
        font: 'bold',
        size: 9.8,
        color: findingStatusColor(finding.status),
        lineHeight: 13,
      }
    );

    drawTextBlock(ctx, normalizeSpace(finding.details), {
      size: 9.4,
      indent: 12,
      lineHeight: 12.5,
      after: 1.5,
    });
  }
}

function drawWarnings(ctx: ReportContext, warnings: string[]) {
  if (warnings.length === 0) return;
  drawSectionHeading(ctx, 'Data Gaps', 'Steps that could not complete. Affected checks were scored as missing.');
  for (const warning of warnings) {
    drawTextBlock(ctx, `- ${normalizeSpace(warning)}`, {
      size: 9.6,
      color: COLOR_MUTED,
      indent: 6,
      lineHeight: 12.8,
    });
  }
}

function extractNodeTextWithLinks($: CheerioAPI, node: Cheerio<Element>): string {
  const chunks: string[] = [];

  node.contents().each((_, child) => {
    const wrapped = $(child);
    if (child.nodeType === 3) {
      chunks.push(wrapped.text());
      return;
    }
    if (child.nodeType !== 1) return;

    if (wrapped.is('a')) {
      const text = normalizeSpace(wrapped.text());
      const href = wrapped.attr('href');
      if (text && href && href !== text) chunks.push(`${text} (${href})`);
      else if (text) chunks.push(text);
      return;
    }

    chunks.push(normalizeSpace(wrapped.text()));
  });

  return normalizeSpace(chunks.join(' '));
}

function drawDeepAnalysis(ctx: ReportContext, diagnosis: Diagnosis) {
  drawSectionHeading(ctx, 'Deep Analysis');

  if (!diagnosis.deepAnalysis) {
    drawTextBlock(ctx, 'Deep analysis was not requested for this report.', {
      color: COLOR_MUTED,
      lineHeight: 14,
    });
    return;
  }

  const md = new MarkdownIt({ html: false, linkify: true, typographer: false });
  const html = md.render(renderDeepAnalysisMarkdown(diagnosis.deepAnalysis));
  const $ = loadHtml(`<article>${html}</article>`);

  $('article').children().each((_, block) => {
    const node = $(block);
    const tag = block.tagName.toLowerCase();

    if (/^h[1-6]$/.test(tag)) {
      const level = Number(tag.slice(1));
      const size = level <= 2 ? 13.8 : 12;
      drawTextBlock(ctx, extractNodeTextWithLinks($, node), {
        font: 'bold',
        size,
        color: COLOR_BRAND,
        lineHeight: size + 4,
        before: level <= 2 ? 6 : 3,
        after: 1,
      });
      return;
    }

    if (tag === 'ul' || tag === 'ol') {
      const ordered = tag === 'ol';
      node.children('li').each((index, li) => {
        const prefix = ordered ? `${index + 1}.` : '-';
        drawTextBlock(ctx, `${prefix} ${extractNodeTextWithLinks($, $(li))}`, {
          size: 10.3,
          indent: 10,
          lineHeight: 13.8,
        });
      });
      ctx.y -= 1;
      return;
    }

    const text = extractNodeTextWithLinks($, node);
    if (text) {
      drawTextBlock(ctx, text, {
        size: 10.5,
        lineHeight: 14.2,
        after: 1,
      });
    }
  });
}

function drawFooter(page: PDFPage, fonts: PdfFonts, support: FontSupport, pageNumber: number, totalPages: number) {
  const footerY = PAGE_MARGIN_BOTTOM - 20;

  page.drawLine({
    start: { x: PAGE_MARGIN_X, y: footerY + 12 },
    end: { x: PAGE_WIDTH - PAGE_MARGIN_X, y: footerY + 12 },
    thickness: 0.6,
    color: COLOR_BORDER,
  });

  page.drawText(sanitizeForFont('Generated by Dinerscope', support.body), {
    x: PAGE_MARGIN_X,
    y: footerY,
    font: fonts.body,
    size: 8.5,
    color: COLOR_MUTED,
  });

  const right = `Page ${pageNumber} of ${totalPages}`;
  const rightWidth = fonts.body.widthOfTextAtSize(right, 8.5);
  page.drawText(right, {
    x: PAGE_WIDTH - PAGE_MARGIN_X - rightWidth,
    y: footerY,
    font: fonts.body,
    size: 8.5,
    color: COLOR_MUTED,
  });
}

export async function generateDiagnosisReportPdf(diagnosis: Diagnosis): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  const fonts = await embedFonts(doc);
  const support = createFontSupport(fonts);
  const restaurant = diagnosis.place.name || diagnosis.query;

  doc.setTitle(`${REPORT_NAME} - ${restaurant}`);
  doc.setAuthor('Dinerscope');
  doc.setCreator('Dinerscope');
  doc.setSubject('Restaurant online health diagnosis');
  doc.setKeywords(['restaurant', 'local seo', 'menu', 'report']);
  doc.setCreationDate(new Date());
  doc.setModificationDate(new Date());

  const ctx: ReportContext = {
    doc,
    fonts,
    support,
    page: doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]),
    y: 0,
    restaurant,
  };

  drawPageHeader(ctx);
  ctx.y = PAGE_HEIGHT - PAGE_MARGIN_TOP - PAGE_HEADER_HEIGHT;

  drawCover(ctx, diagnosis);
  drawSummary(ctx, diagnosis);
  drawRevenue(ctx, diagnosis);
  drawCompetitors(ctx, diagnosis);
  drawRecommendations(ctx, diagnosis);
  for (const key of CHECKLIST_ORDER) {
    drawChecklist(ctx, key, diagnosis.checklists[key]);
  }
  drawWarnings(ctx, diagnosis.warnings);
  drawDeepAnalysis(ctx, diagnosis);

  const pages = doc.getPages();
  pages.forEach((page, index) => {
    drawFooter(page, fonts, support, index + 1, pages.length);
  });

  return doc.save();
}
