import { beforeEach, describe, expect, it, vi } from 'vitest';

const pdfjsMock = vi.hoisted(() => ({ getDocument: vi.fn() }));
const mammothMock = vi.hoisted(() => ({ convertToHtml: vi.fn(), extractRawText: vi.fn() }));

vi.mock('pdfjs-dist', () => ({ default: pdfjsMock }));
vi.mock('mammoth', () => ({ default: mammothMock }));

import { createDefaultRegistry } from '../converters/index.js';
import { decodeText, textToHtmlString, textToMarkdownString } from '../converters/text.js';
import { htmlToMarkdownString, htmlToPlainText } from '../converters/html.js';
import { renderMarkdown } from '../converters/markdown.js';
import { isPdf, renderPdf } from '../converters/pdf.js';
import { FormatGraph } from '../core/FormatGraph.js';
import { signal } from './helpers.js';

const ZIP = Buffer.from([0x50, 0x4b, 0x03, 0x04, 0x14, 0x00]);

function fakePdf(pages: Array<Array<Record<string, unknown>>>) {
  const destroy = vi.fn(async () => undefined);
  const doc = {
    numPages: pages.length,
    getPage: async (n: number) => ({ getTextContent: async () => ({ items: pages[n - 1] }) }),
    destroy,
  };
  pdfjsMock.getDocument.mockReturnValue({ promise: Promise.resolve(doc) });
  return destroy;
}

describe('text converters', () => {
  it('wraps paragraphs and escapes markup', () => {
    expect(textToHtmlString('Hello <world>\nsecond line\n\nNext & last')).toBe(
      '<p>Hello &lt;world&gt;<br>\nsecond line</p>\n<p>Next &amp; last</p>\n'
    );
  });

  it('escapes markdown syntax at line starts and inline', () => {
    expect(textToMarkdownString('# not a heading\n1. not a list\nuse *stars* and _under_')).toBe(
      '\\# not a heading\n1\\. not a list\nuse \\*stars\\* and \\_under\\_\n'
    );
  });

  it('normalises CRLF line endings', async () => {
    const outcome = await createDefaultRegistry().convert({ from: 'text', to: 'html' }, Buffer.from('a\r\nb'), {
      signal: signal(),
    });
    expect(outcome.ok && outcome.output.toString()).toBe('<p>a<br>\nb</p>\n');
  });

  it('renders empty text as an empty document', () => {
    expect(textToHtmlString('  \n\n ')).toBe('');
  });

  it('rejects invalid UTF-8 as malformed input', async () => {
    expect(() => decodeText(Buffer.from([0xff, 0xfe, 0xfd]))).toThrow('Payload is not valid UTF-8 text');
    const outcome = await createDefaultRegistry().convert({ from: 'text', to: 'markdown' }, Buffer.from([0xc3]), {
      signal: signal(),
    });
    expect(outcome).toEqual({ ok: false, kind: 'malformed_input', message: 'Payload is not valid UTF-8 text' });
  });
});

describe('markdown and html converters', () => {
  it('renders markdown to html', async () => {
    expect(await renderMarkdown('# Hello\n\nWorld')).toBe('<h1>Hello</h1>\n<p>World</p>\n');
  });

  it('round-trips markdown through html', async () => {
    expect(htmlToMarkdownString(await renderMarkdown('# Hello\n\nWorld'))).toBe('# Hello\n\nWorld');
  });

  it('extracts plain text from html without upper-casing headings', () => {
    expect(htmlToPlainText('<p>One</p><p>Two</p>')).toBe('One\n\nTwo');
    expect(htmlToPlainText('<h1>Title</h1><p>Body</p>')).toBe('Title\n\nBody');
  });

  it('converts markdown to text', async () => {
    const outcome = await createDefaultRegistry().convert(
      { from: 'markdown', to: 'text' },
      Buffer.from('# Hello\n\nWorld'),
      { signal: signal() }
    );
    expect(outcome.ok && outcome.output.toString()).toBe('Hello\n\nWorld');
  });
});

describe('pdf converters', () => {
  beforeEach(() => {
    pdfjsMock.getDocument.mockReset();
  });

  it('renders html to a pdf document', async () => {
    const outcome = await createDefaultRegistry().convert(
      { from: 'html', to: 'pdf' },
      Buffer.from('<h1>Report</h1><p>Quarterly numbers</p>'),
      { signal: signal() }
    );
    expect(outcome.ok).toBe(true);
    if (outcome.ok) expect(isPdf(outcome.output)).toBe(true);
  });

  it('refuses characters the standard fonts cannot draw', async () => {
    await expect(renderPdf('snowman ☃', signal())).rejects.toMatchObject({
      kind: 'unsupported_feature',
      message: 'Character U+2603 cannot be drawn with the built-in PDF fonts',
    });
  });

  it('extracts text page by page', async () => {
    const destroy = fakePdf([
      [
        { str: 'Hello', hasEOL: true },
        { str: 'World', hasEOL: false },
      ],
      [{ str: 'Page two', hasEOL: false }, { type: 'beginMarkedContent' }],
    ]);
    const outcome = await createDefaultRegistry().convert(
      { from: 'pdf', to: 'text' },
      Buffer.from('%PDF-1.7 test'),
      { signal: signal() }
    );
    expect(outcome.ok && outcome.output.toString()).toBe('Hello\nWorld\n\nPage two');
    expect(destroy).toHaveBeenCalledTimes(1);
  });

  it('rejects input without the pdf signature', async () => {
    const outcome = await createDefaultRegistry().convert({ from: 'pdf', to: 'text' }, Buffer.from('hello'), {
      signal: signal(),
    });
    expect(outcome).toEqual({ ok: false, kind: 'malformed_input', message: 'Payload is not a PDF document' });
    expect(pdfjsMock.getDocument).not.toHaveBeenCalled();
  });

  it('reports parser structure errors as malformed input', async () => {
    const err = new Error('Invalid PDF structure.');
    err.name = 'InvalidPDFException';
    pdfjsMock.getDocument.mockImplementation(() => ({ promise: Promise.reject(err) }));
    const outcome = await createDefaultRegistry().convert(
      { from: 'pdf', to: 'text' },
      Buffer.from('%PDF-1.4 broken'),
      { signal: signal() }
    );
    expect(outcome).toEqual({ ok: false, kind: 'malformed_input', message: 'Malformed PDF: Invalid PDF structure.' });
  });
});

describe('docx converters', () => {
  beforeEach(() => {
    mammothMock.convertToHtml.mockReset().mockResolvedValue({ value: '<p>Doc</p>', messages: [] });
    mammothMock.extractRawText.mockReset().mockResolvedValue({ value: '  Doc text \n', messages: [] });
  });

  it('reads docx as html and text', async () => {
    const registry = createDefaultRegistry();
    const html = await registry.convert({ from: 'docx', to: 'html' }, ZIP, { signal: signal() });
    const text = await registry.convert({ from: 'docx', to: 'text' }, ZIP, { signal: signal() });
    expect(html.ok && html.output.toString()).toBe('<p>Doc</p>');
    expect(text.ok && text.output.toString()).toBe('Doc text');
    expect(mammothMock.convertToHtml).toHaveBeenCalledWith({ buffer: ZIP });
  });

  it('rejects input that is not a zip archive', async () => {
    const outcome = await createDefaultRegistry().convert({ from: 'docx', to: 'html' }, Buffer.from('plain'), {
      signal: signal(),
    });
    expect(outcome).toEqual({ ok: false, kind: 'malformed_input', message: 'Payload is not a DOCX (ZIP) document' });
  });

  it('chains docx to markdown through html', async () => {
    const registry = createDefaultRegistry();
    const path = new FormatGraph().resolve('docx', 'markdown');
    expect(path).not.toBeNull();
    let data: Buffer = ZIP;
    for (const hop of path?.hops ?? []) {
      const outcome = await registry.convert(hop, data, { signal: signal() });
      if (!outcome.ok) throw new Error(outcome.message);
      data = outcome.output;
    }
    expect(data.toString()).toBe('Doc');
  });
});
