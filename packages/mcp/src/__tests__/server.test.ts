/**
 * MCP Server Tests
 *
 * Drives the server through a linked in-memory transport pair.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';

import { createPatternbookMCPServer } from '../server.js';

let client: Client | undefined;

async function connect(): Promise<Client> {
  const server = createPatternbookMCPServer();
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  const connected = new Client({ name: 'test-client', version: '0.0.0' });

  await Promise.all([server.connect(serverTransport), connected.connect(clientTransport)]);
  client = connected;
  return connected;
}

afterEach(async () => {
  await client?.close();
  client = undefined;
});

describe('createPatternbookMCPServer', () => {
  it('should list the catalog tools', async () => {
    const connected = await connect();
    const { tools } = await connected.listTools();

    expect(tools.map((tool) => tool.name)).toEqual([
      'patterns_list',
      'patterns_describe',
      'patterns_run',
    ]);
  });

  it('should run a demonstration through callTool', async () => {
    const connected = await connect();
    const result = await connected.callTool({
      name: 'patterns_run',
      arguments: { pattern: 'facade', input: 'Up' },
    });

    expect(result.isError).toBeFalsy();
    const expected = {
      pattern: 'facade',
      lines: ['Lights dimmed.', 'Projector on.', 'Sound system set to surround.', 'Playing movie: Up'],
    };
    expect(result.content).toEqual([{ type: 'text', text: JSON.stringify(expected, null, 2) }]);
  });

  it('should return an error result for an unknown tool', async () => {
    const connected = await connect();
    const result = await connected.callTool({ name: 'patterns_delete', arguments: {} });

    expect(result.isError).toBe(true);
    expect(result.content).toEqual([{ type: 'text', text: 'Unknown tool: patterns_delete' }]);
  });
});
