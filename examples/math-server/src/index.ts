import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createMathServer } from './server.js';

const server = createMathServer();

server.connect(new StdioServerTransport()).catch((err) => {
  console.error('Failed to start math server:', err);
  process.exit(1);
});

// Graceful shutdown
const shutdown = () => {
  server.close().then(
    () => process.exit(0),
    (err: unknown) => {
      console.error('Error closing math server:', err);
      process.exit(1);
    },
  );
};
process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
