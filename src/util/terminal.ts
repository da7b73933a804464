import chalk from 'chalk';
import MarkdownIt from 'markdown-it';

const md = new MarkdownIt({
  breaks: true,
  linkify: true,
});

const FRAME_BAR = '─'.repeat(44);

export type Styler = (value: string) => string;

export const identity: Styler = (value: string) => value;

export interface BlockParts {
  top: string;
  body: string;
  bottom: string;
}

const NAMED_ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&apos;': "'",
  '&nbsp;': ' ',
};

export function decodeHtmlEntities(value: string): string {
  return value
    .replace(/&#x([0-9a-f]+);/gi, (_m: string, hex: string) => String.fromCodePoint(parseInt(hex, 16)))
    .replace(/&#(\d+);/g, (_m: string, dec: string) => String.fromCodePoint(Number.parseInt(dec, 10)))
    .replace(/&[a-z]+;/gi, (entity: string) => NAMED_ENTITIES[entity.toLowerCase()] ?? entity);
}

export function createBlock(title: string, message: string, accent: Styler, body: Styler): BlockParts {
  const lines = message.split('\n').map((line) => (line.length === 0 ? ' ' : line));
  const topPlain = `┌─ ${title.toUpperCase()} ${FRAME_BAR}`;
  const bottomPlain = `└${'─'.repeat(Math.max(topPlain.length - 1, 0))}`;
  const prefixed = lines.map((line) => `${accent('│')} ${body(line)}`).join('\n');
  return {
    top: accent(topPlain),
    body: prefixed,
    bottom: accent(bottomPlain),
  };
}

export function renderMarkdownToTerminal(markdown: string): string {
  const html = md.render(markdown);

  const formatted = html
    .replace(/<h1>(.*?)<\/h1>/gi, (_m: string, t: string) => chalk.bold.blue(`\n${t}\n`) + '='.repeat(50))
    .replace(/<h2>(.*?)<\/h2>/gi, (_m: string, t: string) => chalk.bold.cyan(`\n${t}\n`) + '-'.repeat(30))
    .replace(/<h3>(.*?)<\/h3>/gi, (_m: string, t: string) => chalk.bold.yellow(`\n${t}`))
    .replace(/<h[4-6]>(.*?)<\/h[4-6]>/gi, (_m: string, t: string) => chalk.bold.magenta(`\n${t}`))

    .replace(/<strong>(.*?)<\/strong>/gi, (_m: string, t: string) => chalk.bold(t))
    .replace(/<em>(.*?)<\/em>/gi, (_m: string, t: string) => chalk.italic(t))
    .replace(/<code>(.*?)<\/code>/gi, (_m: string, t: string) => chalk.bgGray.white(` ${t} `))

    // Links: show both text and URL
    .replace(/<a href="([^"]+)">(.*?)<\/a>/gi, (_m: string, href: string, text: string) => {
      return chalk.blue.underline(text) + ' ' + chalk.gray('(' + href + ')');
    })

    .replace(/<\/?(ul|ol)>/gi, '')
    .replace(/<li>(.*?)<\/li>/gi, '  • $1\n')
    .replace(/<p>([\s\S]*?)<\/p>/gi, '$1\n')
    .replace(/<br\s*\/?>(?!\n)/gi, '\n')

    // Clean up remaining HTML tags
    .replace(/<\/?[^>]+(>|$)/g, '')

    .replace(/\n\s*\n/g, '\n\n')
    .trim();

  return decodeHtmlEntities(formatted);
}
