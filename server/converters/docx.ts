import mammoth from 'mammoth';
import { ConversionError } from '../core/errors.js';
import type { ConverterContext } from '../core/ConverterRegistry.js';

const ZIP_MAGIC = Buffer.from([0x50, 0x4b, 0x03, 0x04]);

export function isZip(input: Buffer): boolean {
  return input.length >= ZIP_MAGIC.length && input.subarray(0, ZIP_MAGIC.length).equals(ZIP_MAGIC);
}

function assertDocx(input: Buffer) {
  if (!isZip(input)) {
    throw new ConversionError('malformed_input', 'Payload is not a DOCX (ZIP) document');
  }
}

export async function docxToHtml(input: Buffer, ctx: ConverterContext): Promise<Buffer> {
  assertDocx(input);
  ctx.signal.throwIfAborted();
  const { value } = await mammoth.convertToHtml({ buffer: input });
  return Buffer.from(value, 'utf8');
}

export async function docxToText(input: Buffer, ctx: ConverterContext): Promise<Buffer> {
  assertDocx(input);
  ctx.signal.throwIfAborted();
  const { value } = await mammoth.extractRawText({ buffer: input });
  return Buffer.from(value.trim(), 'utf8');
}
