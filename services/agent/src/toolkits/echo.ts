import { ToolExecutionError, type LocalToolkit } from '@toolweave/shared';

export const echoToolkit: LocalToolkit = {
  name: 'echo',
  tools: [
    {
      name: 'echo',
      description: 'Return the given text unchanged. Useful for checking that tool calls work.',
      inputSchema: {
        type: 'object',
        properties: {
          text: { type: 'string', description: 'Text to echo back' },
        },
        required: ['text'],
      },
      handler: (args) => {
        if (typeof args.text !== 'string') {
          throw new ToolExecutionError('echo', 'text: Expected string');
        }
        return { text: args.text };
      },
    },
  ],
};
