import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Logger } from '../core/logger.js';
import { errorMessage } from '../core/errors.js';
import {
  ConversionStatusArgs,
  ConvertDocumentArgs,
  convertDocument,
  getConversionStatus,
  listSupportedFormats,
  type ToolContext,
  type ToolResult,
} from './tools.js';

function failure(err: unknown): ToolResult {
  return { content: [{ type: 'text', text: `Tool failed: ${errorMessage(err)}` }], isError: true };
}

/**
 * MCP tool server over the shared job engine.
 */
export function createMcpServer(ctx: ToolContext, log: Logger, info: { name: string; version: string }) {
  const server = new McpServer(info);

  server.tool('list_supported_formats', 'List document formats and the direct conversions between them', () =>
    listSupportedFormats(ctx)
  );

  server.tool(
    'convert_document',
    'Convert a document between formats; multi-step conversions are routed automatically',
    ConvertDocumentArgs,
    async (args) => {
      try {
        return await convertDocument(ctx, args);
      } catch (err) {
        log.error('mcp_tool_failed', { tool: 'convert_document', error: errorMessage(err) });
        return failure(err);
      }
    }
  );

  server.tool('get_conversion_status', 'Get the status and result of a conversion job', ConversionStatusArgs, (args) =>
    getConversionStatus(ctx, args)
  );

  return server;
}
