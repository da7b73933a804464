import * as cheerio from 'cheerio';
import type { AnyNode } from 'domhandler';
import type { ScrapedInfo, SectionKey } from '../schemas/scraped.js';

type Node = cheerio.Cheerio<AnyNode>;

const HEADING_SELECTOR = 'h2, h3';

// Checked in order; the first match wins.
const SECTION_KEYWORDS: ReadonlyArray<[SectionKey, readonly string[]]> = [
  ['attractions', ['see', 'sight']],
  ['transportation', ['get around', 'transport']],
  ['food', ['eat', 'food']],
  ['tips', ['understand', 'tips']],
];

/**
 * Maps a heading to a bucket by substring match on its lowercased text.
 * Returns undefined when nothing matches.
 */
export function classifyHeading(text: string): SectionKey | undefined {
  const lower = text.toLowerCase();
  for (const [section, keywords] of SECTION_KEYWORDS) {
    if (keywords.some((k) => lower.includes(k))) return section;
  }
  return undefined;
}

function isHeadingBlock(node: Node): boolean {
  if (node.is(HEADING_SELECTOR)) return true;
  return node.is('div.mw-heading') && node.children(HEADING_SELECTOR).length > 0;
}

// Newer MediaWiki output wraps each heading in <div class="mw-heading">; the
// section body follows the wrapper, not the heading itself.
function headingAnchor(heading: Node): Node {
  const parent = heading.parent();
  return parent.is('div.mw-heading') ? parent : heading;
}

function paragraphText(node: Node): string {
  return node.text().replace(/\s+/g, ' ').trim();
}

function collectUntilHeading(start: Node[]): string[] {
  const out: string[] = [];
  for (const node of start) {
    if (isHeadingBlock(node)) break;
    if (node.is('p')) {
      const text = paragraphText(node);
      if (text) out.push(text);
    }
  }
  return out;
}

/**
 * Splits a Wikivoyage article into the five guide buckets.
 *
 * Returns null when the page has no `div.mw-parser-output` container.
 */
export function extractSections(html: string): ScrapedInfo | null {
  const $ = cheerio.load(html);
  const content = $('div.mw-parser-output').first();
  if (content.length === 0) return null;

  const children = content.children().toArray().map((el) => $(el));
  const overview = collectUntilHeading(children);

  const buckets: Record<SectionKey, string[]> = {
    attractions: [],
    transportation: [],
    food: [],
    tips: [],
  };

  // An unmatched heading keeps the previous bucket, so its paragraphs land
  // wherever the last recognised heading pointed. Subsections like "Museums"
  // under "See" rely on this; unrelated ones get misfiled.
  let current: SectionKey | undefined;
  content.find(HEADING_SELECTOR).each((_, el) => {
    const heading = $(el);
    current = classifyHeading(heading.text()) ?? current;
    if (!current) return;
    const siblings = headingAnchor(heading).nextAll().toArray().map((s) => $(s));
    buckets[current].push(...collectUntilHeading(siblings));
  });

  return {
    overview: overview.join(' '),
    attractions: buckets.attractions.join(' '),
    transportation: buckets.transportation.join(' '),
    food: buckets.food.join(' '),
    tips: buckets.tips.join(' '),
  };
}
