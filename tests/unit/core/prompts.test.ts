import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { buildGuideMessages, EMPTY_SECTION, findPromptsDir, getPrompt } from '../../../src/core/prompts.js';

const REPO_ROOT = path.resolve(__dirname, '..', '..', '..');

const info = {
  overview: 'A city.',
  attractions: 'A tower. {tips} stays literal.',
  transportation: '',
  food: 'x'.repeat(30),
  tips: '   ',
};

describe('prompts', () => {
  it('loads the system prompt from disk', async () => {
    const system = await getPrompt('guide_system');
    expect(system).toContain('"food_and_dining"');
    expect(system).toContain('Every value must be a string.');
  });

  it('builds a system and a user message', async () => {
    const messages = await buildGuideMessages('Harbortown', info, 2000);
    expect(messages.map((m) => m.role)).toEqual(['system', 'user']);
    expect(messages[0].content).toBe(await getPrompt('guide_system'));
  });

  it('fills placeholders once and marks empty sections', async () => {
    const [, user] = await buildGuideMessages('Harbortown', info, 2000);
    expect(user.content.startsWith('Write a travel guide for Harbortown using')).toBe(true);
    expect(user.content).toContain('Overview:\nA city.\n');
    expect(user.content).toContain('Attractions:\nA tower. {tips} stays literal.\n');
    expect(user.content).toContain(`Getting around:\n${EMPTY_SECTION}\n`);
    expect(user.content.endsWith(`Practical information:\n${EMPTY_SECTION}`)).toBe(true);
  });

  it('truncates long sections', async () => {
    const [, user] = await buildGuideMessages('Harbortown', info, 10);
    expect(user.content).toContain(`Food:\n${'x'.repeat(10)}…\n`);
  });

  it('truncates by code point without splitting surrogate pairs', async () => {
    const [, user] = await buildGuideMessages('Harbortown', { ...info, food: '😀'.repeat(5) }, 3);
    expect(user.content).toContain('Food:\n😀😀😀…\n');
  });
});

describe('prompt directory lookup', () => {
  const originalCwd = process.cwd();
  const originalPromptsDir = process.env.PROMPTS_DIR;
  let tmp: string;

  beforeEach(() => {
    delete process.env.PROMPTS_DIR;
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'wayguide-'));
    process.chdir(tmp);
  });

  afterEach(() => {
    process.chdir(originalCwd);
    fs.rmSync(tmp, { recursive: true, force: true });
    if (originalPromptsDir === undefined) delete process.env.PROMPTS_DIR;
    else process.env.PROMPTS_DIR = originalPromptsDir;
  });

  it('resolves the source prompts from the compiled module location', () => {
    expect(findPromptsDir(path.join(REPO_ROOT, 'dist', 'src', 'core'))).toBe(path.join(REPO_ROOT, 'src', 'prompts'));
  });

  it('loads prompts when started outside the repository', async () => {
    const loaded: Array<typeof import('../../../src/core/prompts.js')> = [];
    jest.isolateModules(() => {
      loaded.push(require('../../../src/core/prompts'));
    });
    await expect(loaded[0].getPrompt('guide_system')).resolves.toContain('"food_and_dining"');
  });
});
