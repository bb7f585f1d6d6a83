import { ConverterRegistry } from '../core/ConverterRegistry.js';
import { docxToHtml, docxToText } from './docx.js';
import { htmlToMarkdown, htmlToText } from './html.js';
import { markdownToHtml, markdownToText } from './markdown.js';
import { htmlToPdf, pdfToText } from './pdf.js';
import { textToHtml, textToMarkdown } from './text.js';

/**
 * One converter per edge of the default format graph.
 */
export function createDefaultRegistry(): ConverterRegistry {
  return new ConverterRegistry()
    .register('text', 'markdown', textToMarkdown)
    .register('text', 'html', textToHtml)
    .register('markdown', 'html', markdownToHtml)
    .register('markdown', 'text', markdownToText)
    .register('html', 'markdown', htmlToMarkdown)
    .register('html', 'text', htmlToText)
    .register('html', 'pdf', htmlToPdf)
    .register('pdf', 'text', pdfToText)
    .register('docx', 'html', docxToHtml)
    .register('docx', 'text', docxToText);
}
