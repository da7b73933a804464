import { readFile } from 'node:fs/promises';
import fs from 'node:fs';
import path from 'node:path';
import type { ScrapedInfo } from '../schemas/scraped.js';

const PROMPT_NAMES = ['guide_system', 'guide_user'] as const;

export type PromptName = (typeof PROMPT_NAMES)[number];

const PROMPT_FILES: Record<PromptName, string> = {
  guide_system: 'guide_system.md',
  guide_user: 'guide_user.md',
};

const PROMPTS: Partial<Record<PromptName, string>> = {};
let loaded: Promise<void> | undefined;

export const EMPTY_SECTION = '(no information found)';

export function findPromptsDir(moduleDir: string = __dirname): string {
  const candidates: string[] = [];
  if (process.env.PROMPTS_DIR) candidates.push(path.resolve(process.env.PROMPTS_DIR));
  // src/core -> src/prompts when run from sources; dist/src/core -> src/prompts once built
  candidates.push(path.join(moduleDir, '..', 'prompts'));
  candidates.push(path.join(moduleDir, '..', '..', '..', 'src', 'prompts'));
  candidates.push(path.join(process.cwd(), 'src', 'prompts'));
  return candidates.find((c) => fs.existsSync(c)) ?? path.join(moduleDir, '..', 'prompts');
}

export async function preloadPrompts(): Promise<void> {
  loaded ??= (async () => {
    const base = findPromptsDir();
    await Promise.all(
      PROMPT_NAMES.map(async (name) => {
        PROMPTS[name] = (await readFile(path.join(base, PROMPT_FILES[name]), 'utf-8')).trim();
      }),
    );
  })();
  try {
    await loaded;
  } catch (err) {
    loaded = undefined;
    throw err;
  }
}

export async function getPrompt(name: PromptName): Promise<string> {
  await preloadPrompts();
  const text = PROMPTS[name];
  if (!text) throw new Error(`Prompt "${name}" is empty`);
  return text;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

function section(text: string, maxChars: number): string {
  const trimmed = text.trim();
  if (!trimmed) return EMPTY_SECTION;
  const chars = Array.from(trimmed);
  return chars.length > maxChars ? `${chars.slice(0, maxChars).join('')}…` : trimmed;
}

export async function buildGuideMessages(
  destination: string,
  info: ScrapedInfo,
  maxChars: number,
): Promise<ChatMessage[]> {
  const system = await getPrompt('guide_system');
  const template = await getPrompt('guide_user');
  const values: Record<string, string> = {
    destination,
    overview: section(info.overview, maxChars),
    attractions: section(info.attractions, maxChars),
    transportation: section(info.transportation, maxChars),
    food: section(info.food, maxChars),
    tips: section(info.tips, maxChars),
  };
  // Single pass so placeholder-looking text inside the notes stays untouched.
  const user = template.replace(/\{(\w+)\}/g, (m: string, key: string) => values[key] ?? m);
  return [
    { role: 'system', content: system },
    { role: 'user', content: user },
  ];
}
