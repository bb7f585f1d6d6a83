/**
 * The closed set of document formats, in the order they are listed to clients.
 */
export const FORMATS = ['text', 'markdown', 'html', 'pdf', 'docx'] as const;

export type Format = (typeof FORMATS)[number];

const ALIASES: Record<string, Format> = {
  txt: 'text',
  plain: 'text',
  md: 'markdown',
  htm: 'html',
};

const CONTENT_TYPES: Record<Format, string> = {
  text: 'text/plain; charset=utf-8',
  markdown: 'text/markdown; charset=utf-8',
  html: 'text/html; charset=utf-8',
  pdf: 'application/pdf',
  docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
};

const EXTENSIONS: Record<Format, string> = {
  text: 'txt',
  markdown: 'md',
  html: 'html',
  pdf: 'pdf',
  docx: 'docx',
};

export function isFormat(value: unknown): value is Format {
  return typeof value === 'string' && (FORMATS as readonly string[]).includes(value);
}

/**
 * Accepts canonical names and the short aliases clients tend to send (md, txt, htm).
 */
export function parseFormat(value: unknown): Format | undefined {
  if (typeof value !== 'string') return undefined;
  const key = value.trim().toLowerCase().replace(/^\./, '');
  if (isFormat(key)) return key;
  return ALIASES[key];
}

export function contentTypeOf(format: Format): string {
  return CONTENT_TYPES[format];
}

export function extensionOf(format: Format): string {
  return EXTENSIONS[format];
}

export function isBinaryFormat(format: Format): boolean {
  return format === 'pdf' || format === 'docx';
}
