import { z } from 'zod';

export const GUIDE_KEYS = ['overview', 'attractions', 'transportation', 'food_and_dining', 'tips'] as const;

export type GuideKey = (typeof GUIDE_KEYS)[number];

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * Guide values are meant to be plain strings, but local models often nest
 * lists and objects anyway; the renderer dispatches on this variant instead.
 */
export type GuideValue =
  | { kind: 'text'; text: string }
  | { kind: 'list'; items: GuideValue[] }
  | { kind: 'keyed'; entries: Array<[string, GuideValue]> };

export type GuideData = Record<GuideKey, JsonValue>;

export class GuideResponseError extends Error {
  code: 'invalid_json' | 'not_an_object' | 'missing_keys';
  missing: GuideKey[];
  constructor(code: GuideResponseError['code'], message: string, missing: GuideKey[] = []) {
    super(message);
    this.name = 'GuideResponseError';
    this.code = code;
    this.missing = missing;
  }
}

// Presence only; JSON.parse never yields undefined, so this accepts any decoded value.
const present = z.custom<JsonValue>((v) => v !== undefined, { message: 'Required' });

export const GuideDataSchema = z
  .object({
    overview: present,
    attractions: present,
    transportation: present,
    food_and_dining: present,
    tips: present,
  })
  .passthrough();

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decodes a chat completion body into GuideData. Only the presence of the
 * five keys is checked; their values are left as the model sent them.
 */
export function parseGuideResponse(content: string): GuideData {
  let decoded: unknown;
  try {
    decoded = JSON.parse(content);
  } catch (err) {
    throw new GuideResponseError('invalid_json', `Model response is not valid JSON: ${String(err)}`);
  }
  if (!isPlainObject(decoded)) {
    throw new GuideResponseError('not_an_object', 'Model response is not a JSON object');
  }

  const obj = decoded;
  const parsed = GuideDataSchema.safeParse(obj);
  if (!parsed.success) {
    const missing = GUIDE_KEYS.filter((k) => !(k in obj));
    throw new GuideResponseError('missing_keys', `Model response is missing keys: ${missing.join(', ')}`, missing);
  }
  return parsed.data;
}

export function toGuideValue(value: unknown): GuideValue {
  if (typeof value === 'string') return { kind: 'text', text: value };
  if (Array.isArray(value)) return { kind: 'list', items: value.map(toGuideValue) };
  if (isPlainObject(value)) {
    return {
      kind: 'keyed',
      entries: Object.entries(value).map(([k, v]): [string, GuideValue] => [k, toGuideValue(v)]),
    };
  }
  return { kind: 'text', text: String(value) };
}

export function fromGuideValue(value: GuideValue): JsonValue {
  switch (value.kind) {
    case 'text':
      return value.text;
    case 'list':
      return value.items.map(fromGuideValue);
    case 'keyed':
      return Object.fromEntries(value.entries.map(([k, v]) => [k, fromGuideValue(v)]));
  }
}
