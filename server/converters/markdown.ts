import { Marked } from 'marked';
import type { ConverterContext } from '../core/ConverterRegistry.js';
import { htmlToPlainText } from './html.js';
import { decodeText } from './text.js';

const marked = new Marked({ gfm: true });

export async function renderMarkdown(markdown: string): Promise<string> {
  return await marked.parse(markdown);
}

export async function markdownToHtml(input: Buffer, ctx: ConverterContext): Promise<Buffer> {
  ctx.signal.throwIfAborted();
  const html = await renderMarkdown(decodeText(input, 'markdown'));
  return Buffer.from(html, 'utf8');
}

export async function markdownToText(input: Buffer, ctx: ConverterContext): Promise<Buffer> {
  ctx.signal.throwIfAborted();
  const html = await renderMarkdown(decodeText(input, 'markdown'));
  return Buffer.from(htmlToPlainText(html), 'utf8');
}
