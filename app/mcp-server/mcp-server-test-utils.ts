import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

export async function connectTestClient(server: McpServer): Promise<Client> {
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  const client = new Client({ name: 'test-client', version: '1.0.0' });
  await Promise.all([
    server.connect(serverTransport),
    client.connect(clientTransport),
  ]);
  return client;
}

export async function callTool(client: Client, name: string, args: Record<string, unknown> = {}): Promise<CallToolResult> {
  return CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
}

export function readToolText(result: CallToolResult): string {
  const content = result.content.find(function (item) {
    return item.type === 'text';
  });
  if (content === undefined || content.type !== 'text') {
    throw new Error('Tool result has no text content');
  }
  return content.text;
}

export function readToolError(result: CallToolResult): { code: string; message: string } {
  const parsed: unknown = JSON.parse(readToolText(result));
  if (typeof parsed !== 'object' || parsed === null || !('error' in parsed)) {
    throw new Error('Tool result is not an error envelope');
  }
  const { error } = parsed;
  if (typeof error !== 'object' || error === null || !('code' in error) || !('message' in error)) {
    throw new Error('Tool error envelope is malformed');
  }
  return { code: String(error.code), message: String(error.message) };
}
