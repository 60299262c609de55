/**
 * A small MCP tool server exposing arithmetic over stdio. Run it as a
 * `subprocess` backend:
 *
 *   { "name": "math", "transport": "subprocess", "command": "npx", "args": ["tsx", "examples/math-server/src/index.ts"] }
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

const OPERATIONS = ['add', 'subtract', 'multiply', 'divide'] as const;

const CalculateArgs = z.object({
  operation: z.enum(OPERATIONS),
  a: z.number(),
  b: z.number(),
});

const SqrtArgs = z.object({ x: z.number() });

export const MATH_TOOLS: Tool[] = [
  {
    name: 'calculate',
    description: 'Apply add, subtract, multiply or divide to two numbers.',
    inputSchema: {
      type: 'object',
      properties: {
        operation: { type: 'string', enum: [...OPERATIONS] },
        a: { type: 'number', description: 'First operand' },
        b: { type: 'number', description: 'Second operand' },
      },
      required: ['operation', 'a', 'b'],
    },
  },
  {
    name: 'sqrt',
    description: 'Square root of a non-negative number.',
    inputSchema: {
      type: 'object',
      properties: { x: { type: 'number', description: 'A non-negative number' } },
      required: ['x'],
    },
  },
];

function json(value: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value) }] };
}

function failure(message: string): CallToolResult {
  return { content: [{ type: 'text', text: message }], isError: true };
}

function calculate(args: z.infer<typeof CalculateArgs>): CallToolResult {
  const { operation, a, b } = args;
  switch (operation) {
    case 'add':
      return json({ result: a + b, operation, a, b });
    case 'subtract':
      return json({ result: a - b, operation, a, b });
    case 'multiply':
      return json({ result: a * b, operation, a, b });
    case 'divide':
      if (b === 0) return failure('Division by zero');
      return json({ result: a / b, operation, a, b });
  }
}

export interface MathServerOptions {
  /** Artificial latency per call, for exercising concurrency */
  delayMs?: number;
}

export function createMathServer(options: MathServerOptions = {}): Server {
  const server = new Server({ name: 'math-server', version: '0.1.0' }, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: MATH_TOOLS }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    if (options.delayMs) {
      await new Promise((resolve) => setTimeout(resolve, options.delayMs));
    }

    const { name, arguments: args } = request.params;
    switch (name) {
      case 'calculate': {
        const parsed = CalculateArgs.safeParse(args ?? {});
        if (!parsed.success) return failure(`Invalid arguments: ${parsed.error.issues[0].message}`);
        return calculate(parsed.data);
      }
      case 'sqrt': {
        const parsed = SqrtArgs.safeParse(args ?? {});
        if (!parsed.success) return failure(`Invalid arguments: ${parsed.error.issues[0].message}`);
        if (parsed.data.x < 0) return failure('Cannot take the square root of a negative number');
        return json({ result: Math.sqrt(parsed.data.x) });
      }
      default:
        return failure(`Unknown tool: ${name}`);
    }
  });

  return server;
}
