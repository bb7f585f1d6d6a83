import { z } from 'zod';
import { pathFormats, type JobEngine } from '../core/JobEngine.js';
import { isTerminal } from '../core/JobStore.js';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export type ToolContext = {
  engine: JobEngine;
  syncWaitMs: number;
};

export const ConvertDocumentArgs = {
  source_format: z.string().describe('Format of the input document (text, markdown, html, pdf, docx)'),
  target_format: z.string().describe('Format to convert into'),
  content: z.string().describe('Document content; base64 for binary formats'),
  encoding: z.enum(['utf8', 'base64']).optional().describe('How content is encoded (default utf8)'),
  wait: z.boolean().optional().describe('Wait for the conversion to finish before returning'),
};

export const ConversionStatusArgs = {
  job_id: z.string().describe('Job id returned by convert_document'),
};

const ConvertDocumentSchema = z.object(ConvertDocumentArgs);
const ConversionStatusSchema = z.object(ConversionStatusArgs);

function json(value: unknown, isError = false): ToolResult {
  const result: ToolResult = { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
  if (isError) result.isError = true;
  return result;
}

export function listSupportedFormats(ctx: ToolContext): ToolResult {
  return json({ formats: ctx.engine.listFormats(), conversions: ctx.engine.conversions() });
}

export async function convertDocument(
  ctx: ToolContext,
  args: z.infer<typeof ConvertDocumentSchema>
): Promise<ToolResult> {
  const payload = Buffer.from(args.content, args.encoding === 'base64' ? 'base64' : 'utf8');
  const submitted = ctx.engine.submit(args.source_format, args.target_format, payload);
  if (!submitted.ok) {
    return json({ error: submitted.reason, message: submitted.message }, true);
  }

  if (args.wait) {
    const view = await ctx.engine.waitForCompletion(submitted.jobId, ctx.syncWaitMs);
    if (view && isTerminal(view.status)) return json(view, view.status === 'failed');
  }
  return json({
    job_id: submitted.jobId,
    status: ctx.engine.status(submitted.jobId)?.status ?? 'queued',
    path: pathFormats(submitted.path),
  });
}

export function getConversionStatus(ctx: ToolContext, args: z.infer<typeof ConversionStatusSchema>): ToolResult {
  const view = ctx.engine.status(args.job_id);
  if (!view) return json({ error: 'not_found', message: `Job ${args.job_id} not found` }, true);
  return json(view);
}
