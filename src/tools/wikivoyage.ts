import type { Logger } from 'pino';
import type { GuideConfig } from '../config/guide.js';
import { extractSections } from '../core/extractor.js';
import type { ScrapedInfo } from '../schemas/scraped.js';
import { ExternalFetchError, fetchText, type FetchLike } from '../util/fetch.js';

export function destinationUrl(destination: string, baseUrl: string): string {
  const slug = destination.trim().replace(/ /g, '_');
  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  return `${base}${encodeURIComponent(slug)}`;
}

export interface ScrapeDeps {
  config: Pick<GuideConfig, 'wikivoyageBaseUrl' | 'userAgent' | 'scraperTimeoutMs'>;
  log: Logger;
  fetchImpl?: FetchLike;
}

/**
 * Fetches the destination's Wikivoyage article and splits it into buckets.
 * Any failure is logged and yields null; a missing page and a dropped
 * connection look the same to the caller.
 */
export async function scrapeDestination(destination: string, deps: ScrapeDeps): Promise<ScrapedInfo | null> {
  const { config, log } = deps;
  const url = destinationUrl(destination, config.wikivoyageBaseUrl);

  let html: string;
  try {
    html = await fetchText(url, {
      timeoutMs: config.scraperTimeoutMs,
      headers: { 'User-Agent': config.userAgent },
      target: 'wikivoyage',
      fetchImpl: deps.fetchImpl,
      log,
    });
  } catch (err) {
    const reason = err instanceof ExternalFetchError ? `${err.kind}:${err.message}` : String(err);
    log.error({ destination, url, reason }, 'Error fetching destination page');
    return null;
  }

  const info = extractSections(html);
  if (!info) {
    log.error({ destination, url }, 'Destination page has no article content');
    return null;
  }

  log.debug(
    {
      destination,
      chars: {
        overview: info.overview.length,
        attractions: info.attractions.length,
        transportation: info.transportation.length,
        food: info.food.length,
        tips: info.tips.length,
      },
    },
    'Destination page scraped',
  );
  return info;
}
