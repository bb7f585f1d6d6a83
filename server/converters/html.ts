import TurndownService from 'turndown';
import { convert } from 'html-to-text';
import type { ConverterContext } from '../core/ConverterRegistry.js';
import { decodeText } from './text.js';

const turndown = new TurndownService({
  headingStyle: 'atx',
  codeBlockStyle: 'fenced',
  bulletListMarker: '-',
  emDelimiter: '*',
});

const HEADINGS = ['h1', 'h2', 'h3', 'h4', 'h5', 'h6'].map((selector) => ({
  selector,
  options: { uppercase: false },
}));

export function htmlToMarkdownString(html: string): string {
  return turndown.turndown(html);
}

export function htmlToPlainText(html: string): string {
  return convert(html, {
    wordwrap: false,
    selectors: [
      ...HEADINGS,
      { selector: 'a', options: { ignoreHref: true } },
      { selector: 'img', format: 'skip' },
      { selector: 'table', format: 'dataTable', options: { uppercaseHeaderCells: false } },
    ],
  }).trim();
}

export function htmlToMarkdown(input: Buffer, ctx: ConverterContext): Buffer {
  ctx.signal.throwIfAborted();
  return Buffer.from(htmlToMarkdownString(decodeText(input, 'html')), 'utf8');
}

export function htmlToText(input: Buffer, ctx: ConverterContext): Buffer {
  ctx.signal.throwIfAborted();
  return Buffer.from(htmlToPlainText(decodeText(input, 'html')), 'utf8');
}
