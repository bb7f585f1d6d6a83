import { ConversionError } from '../core/errors.js';
import type { ConverterContext } from '../core/ConverterRegistry.js';

const decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Strict UTF-8 decode; a text payload that is not valid UTF-8 is malformed.
 */
export function decodeText(input: Buffer, label = 'text'): string {
  try {
    return decoder.decode(input).replace(/\r\n?/g, '\n');
  } catch (err) {
    throw new ConversionError('malformed_input', `Payload is not valid UTF-8 ${label}`, { cause: err });
  }
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

const MD_INLINE = /([\\`*_[\]<>])/g;

export function escapeMarkdownLine(line: string): string {
  return line
    .replace(MD_INLINE, '\\$1')
    .replace(/^(\s*)([#+-])/, '$1\\$2')
    .replace(/^(\s*\d+)([.)])/, '$1\\$2');
}

function paragraphs(text: string): string[] {
  return text
    .split(/\n[ \t]*\n+/)
    .map((p) => p.trim())
    .filter(Boolean);
}

export function textToHtmlString(text: string): string {
  const body = paragraphs(text)
    .map((p) => `<p>${escapeHtml(p).replace(/\n/g, '<br>\n')}</p>`)
    .join('\n');
  return body ? `${body}\n` : '';
}

export function textToMarkdownString(text: string): string {
  const body = paragraphs(text)
    .map((p) => p.split('\n').map(escapeMarkdownLine).join('\n'))
    .join('\n\n');
  return body ? `${body}\n` : '';
}

export function textToHtml(input: Buffer, ctx: ConverterContext): Buffer {
  ctx.signal.throwIfAborted();
  return Buffer.from(textToHtmlString(decodeText(input)), 'utf8');
}

export function textToMarkdown(input: Buffer, ctx: ConverterContext): Buffer {
  ctx.signal.throwIfAborted();
  return Buffer.from(textToMarkdownString(decodeText(input)), 'utf8');
}
