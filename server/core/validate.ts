import { z } from 'zod';

const FormatName = z.string().trim().min(1, 'Format required').max(32, 'Format too long');

export const ConvertBody = z
  .object({
    sourceFormat: FormatName,
    targetFormat: FormatName,
    content: z.string(),
    encoding: z.enum(['utf8', 'base64']).optional(),
  })
  .refine((data) => data.encoding !== 'base64' || /^[A-Za-z0-9+/]*={0,2}$/.test(data.content.replace(/\s+/g, '')), {
    message: 'Content is not valid base64',
    path: ['content'],
  });

export const RawConvertQuery = z.object({
  from: FormatName,
  to: FormatName,
  wait: z.string().optional(),
});

export type ConvertBodyType = z.infer<typeof ConvertBody>;
export type RawConvertQueryType = z.infer<typeof RawConvertQuery>;

export function decodeContent(body: ConvertBodyType): Buffer {
  return body.encoding === 'base64' ? Buffer.from(body.content, 'base64') : Buffer.from(body.content, 'utf8');
}

export function isWaitRequested(value: unknown): boolean {
  return value === '1' || value === 'true' || value === 'yes';
}
