import { beforeEach, describe, expect, it } from 'vitest';
import { convertDocument, getConversionStatus, listSupportedFormats, type ToolContext, type ToolResult } from '../mcp/tools.js';
import { createServices } from '../services.js';
import { createMockLogger, testConfig } from './helpers.js';

function parse(result: ToolResult): unknown {
  return JSON.parse(result.content[0].text);
}

describe('MCP tools', () => {
  let ctx: ToolContext;

  beforeEach(() => {
    const services = createServices(testConfig(), { log: createMockLogger() });
    ctx = { engine: services.engine, syncWaitMs: 2_000 };
  });

  it('lists supported formats', () => {
    const result = listSupportedFormats(ctx);
    expect(result.isError).toBeUndefined();
    expect(parse(result)).toMatchObject({ formats: ['text', 'markdown', 'html', 'pdf', 'docx'] });
  });

  it('converts and waits for the result', async () => {
    const result = await convertDocument(ctx, {
      source_format: 'markdown',
      target_format: 'html',
      content: '# Hello\n\nWorld',
      wait: true,
    });
    expect(result.isError).toBeUndefined();
    expect(parse(result)).toMatchObject({
      status: 'completed',
      result: { content: '<h1>Hello</h1>\n<p>World</p>\n' },
    });
  });

  it('returns a job id without waiting', async () => {
    const result = await convertDocument(ctx, { source_format: 'text', target_format: 'markdown', content: 'x' });
    expect(parse(result)).toEqual({ job_id: expect.any(String), status: 'queued', path: ['text', 'markdown'] });
  });

  it('flags rejected conversions as errors', async () => {
    const result = await convertDocument(ctx, { source_format: 'text', target_format: 'docx', content: 'x' });
    expect(result.isError).toBe(true);
    expect(parse(result)).toEqual({
      error: 'unsupported_conversion',
      message: 'No conversion path between the requested formats',
    });
  });

  it('flags failed conversions as errors', async () => {
    const result = await convertDocument(ctx, {
      source_format: 'text',
      target_format: 'html',
      content: Buffer.from([0xff]).toString('base64'),
      encoding: 'base64',
      wait: true,
    });
    expect(result.isError).toBe(true);
    expect(parse(result)).toMatchObject({ status: 'failed', error: { kind: 'malformed_input' } });
  });

  it('reports status of known and unknown jobs', async () => {
    const submitted = await convertDocument(ctx, { source_format: 'text', target_format: 'html', content: 'x', wait: true });
    const view = parse(submitted);
    const id = typeof view === 'object' && view !== null && 'id' in view ? String(view.id) : '';

    expect(parse(getConversionStatus(ctx, { job_id: id }))).toMatchObject({ id, status: 'completed' });

    const missing = getConversionStatus(ctx, { job_id: 'nope' });
    expect(missing.isError).toBe(true);
    expect(parse(missing)).toEqual({ error: 'not_found', message: 'Job nope not found' });
  });
});
