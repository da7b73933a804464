export const SCRAPED_KEYS = ['overview', 'attractions', 'transportation', 'food', 'tips'] as const;

export type ScrapedKey = (typeof SCRAPED_KEYS)[number];

export type ScrapedInfo = Readonly<Record<ScrapedKey, string>>;

export type SectionKey = Exclude<ScrapedKey, 'overview'>;
