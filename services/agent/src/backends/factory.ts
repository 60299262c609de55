/**
 * Maps each backend definition to exactly one implementation. This is the only
 * place that branches on `transport`.
 */

import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type {
  BackendDefinition,
  SocketBackendDefinition,
  SocketProtocol,
  SubprocessBackendDefinition,
} from '@toolweave/shared';
import { LocalBackend, type ToolkitResolver } from './local-backend.js';
import { McpBackend, type TransportFactory } from './mcp-backend.js';
import { LineBuffer } from './output.js';
import { WebSocketTransport } from './websocket-transport.js';
import type { ToolBackend } from './types.js';

export interface BackendDeps {
  resolveToolkit: ToolkitResolver;
  /** Overrides transport construction for MCP backends (used by tests) */
  createTransport?: (definition: SubprocessBackendDefinition | SocketBackendDefinition) => Transport;
  stderrLines?: number;
}

export function inferSocketProtocol(definition: SocketBackendDefinition): SocketProtocol {
  if (definition.protocol) return definition.protocol;
  const scheme = new URL(definition.url).protocol;
  return scheme === 'ws:' || scheme === 'wss:' ? 'websocket' : 'streamable-http';
}

function stdioTransport(definition: SubprocessBackendDefinition, diagnostics: LineBuffer): TransportFactory {
  return () => {
    const transport = new StdioClientTransport({
      command: definition.command,
      args: definition.args,
      env: { ...getDefaultEnvironment(), ...definition.env },
      cwd: definition.cwd,
      stderr: 'pipe',
    });
    transport.stderr?.on('data', (chunk: Buffer) => diagnostics.write(chunk.toString('utf-8')));
    return transport;
  };
}

function socketTransport(definition: SocketBackendDefinition): TransportFactory {
  return () => {
    const url = new URL(definition.url);
    const requestInit: RequestInit | undefined = definition.headers ? { headers: definition.headers } : undefined;
    switch (inferSocketProtocol(definition)) {
      case 'websocket':
        return new WebSocketTransport(url, { headers: definition.headers });
      case 'sse':
        return new SSEClientTransport(url, { requestInit });
      case 'streamable-http':
        return new StreamableHTTPClientTransport(url, { requestInit });
    }
  };
}

export function createBackend(definition: BackendDefinition, deps: BackendDeps): ToolBackend {
  switch (definition.transport) {
    case 'local':
      return new LocalBackend(definition, deps.resolveToolkit);

    case 'subprocess': {
      const diagnostics = new LineBuffer(deps.stderrLines);
      const override = deps.createTransport;
      return new McpBackend({
        id: definition.name,
        transport: 'subprocess',
        timeoutMs: definition.timeoutMs,
        diagnostics,
        createTransport: override ? () => override(definition) : stdioTransport(definition, diagnostics),
      });
    }

    case 'socket': {
      const override = deps.createTransport;
      return new McpBackend({
        id: definition.name,
        transport: 'socket',
        timeoutMs: definition.timeoutMs,
        createTransport: override ? () => override(definition) : socketTransport(definition),
      });
    }
  }
}
