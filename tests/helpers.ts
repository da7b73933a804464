import fs from 'node:fs';
import path from 'node:path';
import pino from 'pino';
import type { GuideConfig } from '../src/config/guide.js';
import type { FetchLike, FetchResponseLike } from '../src/util/fetch.js';

export function silentLogger() {
  return pino({ level: 'silent' });
}

export function readFixture(name: string): string {
  return fs.readFileSync(path.join(__dirname, 'fixtures', name), 'utf-8');
}

export function textResponse(body: string, status = 200, statusText = 'OK'): FetchResponseLike {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    text: async () => body,
  };
}

export function jsonResponse(body: unknown, status = 200): FetchResponseLike {
  return textResponse(JSON.stringify(body), status);
}

export function mockFetch(...responses: FetchResponseLike[]) {
  const fn = jest.fn<ReturnType<FetchLike>, Parameters<FetchLike>>();
  for (const r of responses) fn.mockResolvedValueOnce(r);
  return fn;
}

export const TEST_CONFIG: GuideConfig = {
  wikivoyageBaseUrl: 'https://en.wikivoyage.org/wiki/',
  userAgent: 'test-agent/1.0',
  scraperTimeoutMs: 1000,
  sectionMaxChars: 2000,
  llmBaseUrl: 'http://localhost:1234/v1',
  llmApiKey: 'test-key',
  llmModel: 'test-model',
  llmTemperature: 0.7,
  llmTimeoutMs: 1000,
};

export function completionResponse(content: string): FetchResponseLike {
  return jsonResponse({ choices: [{ message: { role: 'assistant', content } }] });
}
