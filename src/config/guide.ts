import { z } from 'zod';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

const GuideConfigSchema = z.object({
  wikivoyageBaseUrl: z.string().url().default('https://en.wikivoyage.org/wiki/'),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  scraperTimeoutMs: z.coerce.number().int().min(100).default(15000),
  sectionMaxChars: z.coerce.number().int().min(1).default(2000),
  llmBaseUrl: z.string().url().default('http://localhost:1234/v1'),
  llmApiKey: z.string().default('lm-studio'),
  llmModel: z.string().min(1).default('local-model'),
  llmTemperature: z.coerce.number().min(0).max(2).default(0.7),
  llmTimeoutMs: z.coerce.number().int().min(500).default(120000),
});

export type GuideConfig = z.infer<typeof GuideConfigSchema>;

// Empty strings in .env files mean "unset".
function opt(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

export function loadGuideConfig(env: NodeJS.ProcessEnv = process.env): GuideConfig {
  return GuideConfigSchema.parse({
    wikivoyageBaseUrl: opt(env.WIKIVOYAGE_BASE_URL),
    userAgent: opt(env.SCRAPER_USER_AGENT),
    scraperTimeoutMs: opt(env.SCRAPER_TIMEOUT_MS),
    sectionMaxChars: opt(env.SCRAPE_SECTION_MAX_CHARS),
    llmBaseUrl: opt(env.LLM_BASE_URL),
    llmApiKey: opt(env.LLM_API_KEY),
    llmModel: opt(env.LLM_MODEL),
    llmTemperature: opt(env.LLM_TEMPERATURE),
    llmTimeoutMs: opt(env.LLM_TIMEOUT_MS),
  });
}
