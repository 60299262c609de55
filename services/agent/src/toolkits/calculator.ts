import { z } from 'zod';
import { ToolExecutionError, type LocalToolkit } from '@toolweave/shared';

export const CALCULATOR_OPERATIONS = ['add', 'subtract', 'multiply', 'divide'] as const;
export type CalculatorOperation = (typeof CALCULATOR_OPERATIONS)[number];

const ArgsSchema = z.object({
  operation: z.enum(CALCULATOR_OPERATIONS),
  a: z.number(),
  b: z.number(),
});

export function calculate(operation: CalculatorOperation, a: number, b: number): number {
  switch (operation) {
    case 'add':
      return a + b;
    case 'subtract':
      return a - b;
    case 'multiply':
      return a * b;
    case 'divide':
      if (b === 0) throw new Error('Division by zero');
      return a / b;
  }
}

export const calculatorToolkit: LocalToolkit = {
  name: 'calculator',
  tools: [
    {
      name: 'calculator',
      description: 'Perform basic arithmetic on two numbers.',
      inputSchema: {
        type: 'object',
        properties: {
          operation: { type: 'string', enum: [...CALCULATOR_OPERATIONS], description: 'The operation to perform' },
          a: { type: 'number', description: 'First operand' },
          b: { type: 'number', description: 'Second operand' },
        },
        required: ['operation', 'a', 'b'],
      },
      handler: (args) => {
        const parsed = ArgsSchema.safeParse(args);
        if (!parsed.success) {
          throw new ToolExecutionError('calculator', parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '));
        }
        const { operation, a, b } = parsed.data;
        try {
          return { result: calculate(operation, a, b) };
        } catch (err) {
          throw new ToolExecutionError('calculator', err instanceof Error ? err.message : String(err), { cause: err });
        }
      },
    },
  ],
};
