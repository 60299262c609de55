import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { createMathServer } from '../server.js';

let server: Server;
let client: Client;

beforeEach(async () => {
  server = createMathServer();
  client = new Client({ name: 'math-test', version: '0.1.0' }, { capabilities: {} });
  const [clientSide, serverSide] = InMemoryTransport.createLinkedPair();
  await Promise.all([server.connect(serverSide), client.connect(clientSide)]);
});

afterEach(async () => {
  await client.close();
  await server.close();
});

describe('math server', () => {
  it('lists calculate and sqrt', async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name)).toEqual(['calculate', 'sqrt']);
    expect(tools[0].inputSchema.required).toEqual(['operation', 'a', 'b']);
  });

  it('adds two numbers', async () => {
    const result = await client.callTool({ name: 'calculate', arguments: { operation: 'add', a: 10, b: 5 } });
    expect(result).toMatchObject({
      content: [{ type: 'text', text: '{"result":15,"operation":"add","a":10,"b":5}' }],
    });
    expect(result.isError).toBeUndefined();
  });

  it('takes square roots', async () => {
    const result = await client.callTool({ name: 'sqrt', arguments: { x: 2.25 } });
    expect(result.content).toEqual([{ type: 'text', text: '{"result":1.5}' }]);
  });

  it('reports division by zero as a tool error', async () => {
    const result = await client.callTool({ name: 'calculate', arguments: { operation: 'divide', a: 1, b: 0 } });
    expect(result).toMatchObject({ isError: true, content: [{ type: 'text', text: 'Division by zero' }] });
  });

  it('rejects negative square roots', async () => {
    const result = await client.callTool({ name: 'sqrt', arguments: { x: -4 } });
    expect(result).toMatchObject({
      isError: true,
      content: [{ type: 'text', text: 'Cannot take the square root of a negative number' }],
    });
  });

  it('validates arguments', async () => {
    const result = await client.callTool({ name: 'calculate', arguments: { operation: 'modulo', a: 1, b: 2 } });
    expect(result.isError).toBe(true);
  });

  it('reports unknown tools', async () => {
    const result = await client.callTool({ name: 'cube', arguments: {} });
    expect(result).toMatchObject({ isError: true, content: [{ type: 'text', text: 'Unknown tool: cube' }] });
  });
});
