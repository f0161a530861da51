import { connectTestClient } from '@app/mcp-server/mcp-server-test-utils.js';
import { SqliteStorageBackend, buildInvoiceToolRegistry, createDomainServices, createInvoiceMcpServer } from '@app/index.js';

const backend = new SqliteStorageBackend(':memory:');
await backend.connect();

const services = createDomainServices(backend.handle, { kind: 'absent', reason: 'catalog only' });
const server = createInvoiceMcpServer(buildInvoiceToolRegistry(services));
const client = await connectTestClient(server);

const tools = await client.listTools();

console.log('Invoice Management MCP Tools:', JSON.stringify(tools));

await Promise.all([
  client.close(),
  server.close(),
]);
await backend.close();
