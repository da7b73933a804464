#!/usr/bin/env node
import 'dotenv/config';
import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import chalk from 'chalk';
import { loadGuideConfig } from './config/guide.js';
import { generateGuide } from './core/guide.js';
import { listModels } from './core/llm.js';
import { createLogger } from './util/logging.js';
import { createBlock, identity, renderMarkdownToTerminal } from './util/terminal.js';

const log = createLogger();

export interface CliArgs {
  destination: string;
  models: boolean;
  raw: boolean;
  help: boolean;
}

export function parseArgs(argv: string[]): CliArgs {
  const words: string[] = [];
  const args: CliArgs = { destination: '', models: false, raw: false, help: false };
  for (const arg of argv) {
    if (arg === '--models') args.models = true;
    else if (arg === '--raw') args.raw = true;
    else if (arg === '--help' || arg === '-h') args.help = true;
    else words.push(arg);
  }
  args.destination = words.join(' ').trim();
  return args;
}

const USAGE = `Usage: wayguide [--raw] <destination>
       wayguide --models

  --raw     print the Markdown guide without terminal styling
  --models  list the models served by LLM_BASE_URL`;

async function askDestination(): Promise<string> {
  const rl = readline.createInterface({ input, output });
  try {
    return (await rl.question(chalk.blue.bold('Destination> '))).trim();
  } finally {
    rl.close();
  }
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const config = loadGuideConfig();
  log.debug({ llmBaseUrl: config.llmBaseUrl, model: config.llmModel }, 'CLI starting');

  if (args.models) {
    const ids = await listModels({ config, log });
    for (const id of ids) console.log(id);
    return 0;
  }

  const destination = args.destination || (await askDestination());
  if (!destination) {
    console.error(USAGE);
    return 1;
  }

  const guide = await generateGuide(destination, { config, log });
  if (!guide) {
    console.error(chalk.red(`❌ Could not produce a travel guide for ${destination}`));
    return 1;
  }

  if (args.raw) {
    process.stdout.write(guide);
    return 0;
  }

  const block = createBlock(destination, renderMarkdownToTerminal(guide), chalk.greenBright, identity);
  console.log(block.top);
  console.log(block.body);
  console.log(block.bottom);
  return 0;
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((e: unknown) => {
      console.error(e);
      process.exitCode = 1;
    });
}
