import PDFDocument from 'pdfkit';
import pdfjs from 'pdfjs-dist';
import { ConversionError } from '../core/errors.js';
import type { ConverterContext } from '../core/ConverterRegistry.js';
import { htmlToPlainText } from './html.js';
import { decodeText } from './text.js';

// Latin-1 plus the WinAnsi extras the standard PDF fonts can draw.
const UNDRAWABLE =
  /[^\u0000-\u00ff\u0152\u0153\u0160\u0161\u0178\u017d\u017e\u0192\u02c6\u02dc\u2013\u2014\u2018-\u201a\u201c-\u201e\u2020-\u2022\u2026\u2030\u2039\u203a\u20ac\u2122]/u;

const PDF_MAGIC = '%PDF-';

export async function renderPdf(text: string, signal: AbortSignal): Promise<Buffer> {
  const bad = UNDRAWABLE.exec(text);
  if (bad) {
    const code = bad[0].codePointAt(0) ?? 0;
    throw new ConversionError(
      'unsupported_feature',
      `Character U+${code.toString(16).toUpperCase().padStart(4, '0')} cannot be drawn with the built-in PDF fonts`
    );
  }
  signal.throwIfAborted();

  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({ size: 'LETTER', margin: 72 });
    const chunks: Buffer[] = [];
    doc.on('data', (chunk: Buffer) => chunks.push(chunk));
    doc.on('end', () => resolve(Buffer.concat(chunks)));
    doc.on('error', reject);

    doc.font('Helvetica').fontSize(11);
    const blocks = text.split(/\n{2,}/).map((b) => b.trim()).filter(Boolean);
    blocks.forEach((block, i) => {
      if (i > 0) doc.moveDown();
      doc.text(block);
    });
    doc.end();
  });
}

export function isPdf(input: Buffer): boolean {
  return input.subarray(0, PDF_MAGIC.length).toString('latin1') === PDF_MAGIC;
}

export async function extractPdfText(input: Buffer, signal: AbortSignal): Promise<string> {
  if (!isPdf(input)) {
    throw new ConversionError('malformed_input', 'Payload is not a PDF document');
  }
  const doc = await pdfjs.getDocument({
    data: new Uint8Array(input),
    isEvalSupported: false,
    useSystemFonts: true,
    verbosity: 0,
  }).promise;

  try {
    const pages: string[] = [];
    for (let n = 1; n <= doc.numPages; n++) {
      signal.throwIfAborted();
      const page = await doc.getPage(n);
      const content = await page.getTextContent();
      let text = '';
      for (const item of content.items) {
        if (!('str' in item)) continue;
        text += item.str;
        if (item.hasEOL) text += '\n';
      }
      pages.push(text.trim());
    }
    return pages.filter(Boolean).join('\n\n');
  } finally {
    await doc.destroy();
  }
}

export async function htmlToPdf(input: Buffer, ctx: ConverterContext): Promise<Buffer> {
  const text = htmlToPlainText(decodeText(input, 'html'));
  return renderPdf(text, ctx.signal);
}

export async function pdfToText(input: Buffer, ctx: ConverterContext): Promise<Buffer> {
  const text = await extractPdfText(input, ctx.signal);
  return Buffer.from(text, 'utf8');
}
