import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CallToolRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import z from 'zod/v3';

import { InvoiceServiceError, errorMessage } from '@app/errors.js';
import type { Logger } from '@app/logger.js';
import { ToolRegistry } from '@app/mcp-server/tool-registry.js';
import type { ToolGroup } from '@app/mcp-server/tool-registry.js';
import { defineCategoryTools } from '@app/mcp-server/tools/category-tools.js';
import { defineCompanyTools } from '@app/mcp-server/tools/company-tools.js';
import { defineInvoiceItemTools } from '@app/mcp-server/tools/invoice-item-tools.js';
import { defineInvoiceTools } from '@app/mcp-server/tools/invoice-tools.js';
import { defineUploadTools } from '@app/mcp-server/tools/upload-tools.js';
import type { DomainServices } from '@app/services/domain-services.js';

export const MCP_SERVER_NAME = 'invoice-management-mcp';
export const MCP_SERVER_VERSION = '1.0.0';

export function buildInvoiceToolRegistry(services: DomainServices): ToolRegistry {
  const registry = new ToolRegistry();

  // Register category tools
  defineCategoryTools(registry, services.categories);

  // Register company tools
  defineCompanyTools(registry, services.companies);

  // Register invoice tools
  defineInvoiceTools(registry, services.invoices);
  defineInvoiceItemTools(registry, services.invoices);

  // Register upload tools
  defineUploadTools(registry, services.uploads);

  return registry.seal();
}

export function createInvoiceMcpServer(registry: ToolRegistry, logger?: Logger): McpServer {
  if (!registry.sealed) {
    throw new Error('Tool registry must be sealed before it is served');
  }

  const server = new McpServer({
    version: MCP_SERVER_VERSION,
    name: MCP_SERVER_NAME,
    title: 'Invoice Management MCP',
  });

  for (const tool of registry.list()) {
    server.registerTool(tool.name, {
      title: tool.title,
      description: tool.description,
      inputSchema: tool.inputSchema,
      outputSchema: tool.outputSchema,
    }, function (args, extra) {
      return callRegisteredTool(registry, tool.name, args, extra.authInfo?.clientId, logger);
    });
  }

  // Every call goes through the registry, so unknown names and malformed arguments
  // come back in the same error envelope as domain failures.
  server.server.setRequestHandler(CallToolRequestSchema, function (request, extra) {
    return callRegisteredTool(registry, request.params.name, request.params.arguments, extra.authInfo?.clientId, logger);
  });

  defineUsagePrompt(server, registry);

  return server;
}

async function callRegisteredTool(
  registry: ToolRegistry,
  name: string,
  args: unknown,
  subject: string | undefined,
  logger?: Logger,
): Promise<CallToolResult> {
  logger?.debug({ tool: name, subject }, 'tool call');
  try {
    return toolResult(await registry.dispatch(name, args));
  }
  catch (error) {
    return toolErrorResult(error, name, logger);
  }
}

export function toolResult(output: Record<string, unknown>): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(output) }],
    structuredContent: output,
  };
}

export function toolErrorResult(error: unknown, toolName: string, logger?: Logger): CallToolResult {
  let code = 'INTERNAL_ERROR';
  let message = 'Internal error';
  if (error instanceof InvoiceServiceError) {
    code = error.code;
    message = error.message;
  }
  else {
    logger?.error({ err: error, tool: toolName }, 'unexpected tool failure');
    message = `Internal error: ${errorMessage(error)}`;
  }
  return {
    isError: true,
    content: [{ type: 'text', text: JSON.stringify({ error: { code, message } }) }],
  };
}

const GROUP_TITLES: Record<ToolGroup, string> = {
  category: 'Categories',
  company: 'Companies',
  invoice: 'Invoices',
  upload: 'File uploads',
};

function defineUsagePrompt(server: McpServer, registry: ToolRegistry): void {
  server.registerPrompt('invoice-management-usage', {
    title: 'Invoice management usage',
    description: 'Explains the available invoice management tools and how they fit together.',
    argsSchema: {
      group: z.enum(['category', 'company', 'invoice', 'upload']).optional().describe('Only describe tools of this group'),
    },
  }, function ({ group }) {
    const sections: string[] = [];
    for (const [toolGroup, title] of Object.entries(GROUP_TITLES)) {
      if (group !== undefined && group !== toolGroup) {
        continue;
      }
      const lines = registry.list()
        .filter(function (tool) {
          return tool.group === toolGroup;
        })
        .map(function (tool) {
          return `- ${tool.name}: ${tool.description}`;
        });
      sections.push(`## ${title}\n${lines.join('\n')}`);
    }
    return {
      messages: [{
        role: 'user',
        content: {
          type: 'text',
          text: [
            'You manage invoices, the companies on them and the categories they are filed under.',
            'Create categories and companies first, then reference their ids from invoices.',
            'Invoice amounts are the sum of their line items. To attach a document, request a presigned upload URL, PUT the file, and store the returned key as originalDownloadLink.',
            '',
            ...sections,
          ].join('\n'),
        },
      }],
    };
  });
}
