import type { Logger } from 'pino';
import type { GuideConfig } from '../config/guide.js';
import { GuideResponseError, parseGuideResponse } from '../schemas/guide.js';
import { scrapeDestination } from '../tools/wikivoyage.js';
import type { FetchLike } from '../util/fetch.js';
import { chatCompletion, LLMError, type LLMCallOptions } from './llm.js';
import { buildGuideMessages, type ChatMessage } from './prompts.js';
import { renderGuide } from './renderer.js';

export type ChatFn = (messages: ChatMessage[], opts: LLMCallOptions) => Promise<string>;

export interface GuideDeps {
  config: GuideConfig;
  log: Logger;
  /** Used for the page fetch and, unless `chat` is given, the model call. */
  fetchImpl?: FetchLike;
  chat?: ChatFn;
}

function describe(err: unknown): Record<string, unknown> {
  if (err instanceof LLMError) return { code: err.code, status: err.status, message: err.message };
  if (err instanceof GuideResponseError) return { code: err.code, missing: err.missing, message: err.message };
  if (err instanceof Error) return { message: err.message };
  return { message: String(err) };
}

/**
 * scrape → prompt → model → parse → render. Each failure is logged and ends
 * the run with null; nothing is thrown to the caller.
 */
export async function generateGuide(destination: string, deps: GuideDeps): Promise<string | null> {
  const { config, log } = deps;
  const chat = deps.chat ?? chatCompletion;

  const info = await scrapeDestination(destination, { config, log, fetchImpl: deps.fetchImpl });
  if (!info) return null;

  let content: string;
  try {
    const messages = await buildGuideMessages(destination, info, config.sectionMaxChars);
    content = await chat(messages, { config, log, fetchImpl: deps.fetchImpl });
  } catch (err) {
    log.error({ destination, err: describe(err) }, 'Error generating travel guide');
    return null;
  }

  try {
    const data = parseGuideResponse(content);
    return renderGuide(data, destination);
  } catch (err) {
    log.error({ destination, err: describe(err), content: content.slice(0, 500) }, 'Error parsing model response');
    return null;
  }
}
