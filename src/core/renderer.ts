import { fromGuideValue, GUIDE_KEYS, toGuideValue, type GuideKey, type GuideValue } from '../schemas/guide.js';

export const SECTION_TITLES: Record<GuideKey, string> = {
  overview: 'Overview',
  attractions: 'Must-See Attractions',
  transportation: 'Getting Around',
  food_and_dining: 'Food & Dining',
  tips: 'Practical Tips',
};

const LABEL_FIELDS = ['name', 'title'] as const;

function raw(value: GuideValue): string {
  return JSON.stringify(fromGuideValue(value));
}

function field(entries: Array<[string, GuideValue]>, key: string): GuideValue | undefined {
  return entries.find(([k]) => k === key)?.[1];
}

/** `{ name, description }` style items, or undefined when the shape doesn't fit. */
export function labeledItem(value: GuideValue): { label: string; body: GuideValue } | undefined {
  if (value.kind !== 'keyed') return undefined;
  const body = field(value.entries, 'description');
  if (!body) return undefined;
  for (const key of LABEL_FIELDS) {
    const label = field(value.entries, key);
    if (label?.kind === 'text') return { label: label.text, body };
  }
  return undefined;
}

function bullet(item: GuideValue): string {
  return `- ${item.kind === 'text' ? item.text : raw(item)}`;
}

function inline(value: GuideValue): string {
  switch (value.kind) {
    case 'text':
      return value.text;
    case 'list':
      return value.items.map(bullet).join('\n');
    case 'keyed':
      return raw(value);
  }
}

function renderBody(value: GuideValue): string[] {
  switch (value.kind) {
    case 'text':
      return [value.text];
    case 'list': {
      const blocks: string[] = [];
      let bullets: string[] = [];
      const flush = () => {
        if (bullets.length) blocks.push(bullets.join('\n'));
        bullets = [];
      };
      for (const item of value.items) {
        const labeled = labeledItem(item);
        if (labeled) {
          flush();
          blocks.push(`### ${labeled.label}`, inline(labeled.body));
        } else {
          bullets.push(bullet(item));
        }
      }
      flush();
      return blocks;
    }
    case 'keyed':
      return value.entries.flatMap(([key, v]) => [`### ${key}`, inline(v)]);
  }
}

/**
 * Renders model output as a Markdown guide. Sections follow a fixed order and
 * absent keys are skipped. Values that are not plain strings degrade to
 * bullets or raw JSON instead of failing.
 */
export function renderGuide(data: Partial<Record<GuideKey, unknown>>, destination: string): string {
  const blocks: string[] = [`# Travel Guide: ${destination}`];
  for (const key of GUIDE_KEYS) {
    const value = data[key];
    if (value === undefined) continue;
    blocks.push(`## ${SECTION_TITLES[key]}`);
    blocks.push(...renderBody(toGuideValue(value)).filter((b) => b.length > 0));
  }
  return `${blocks.join('\n\n')}\n`;
}
