/**
 * MCP client transport over a WebSocket, built on `ws` (Node 20 has no
 * global WebSocket). One JSON-RPC message per text frame, subprotocol "mcp".
 */

import WebSocket from 'ws';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { JSONRPCMessageSchema, type JSONRPCMessage } from '@modelcontextprotocol/sdk/types.js';

const SUBPROTOCOL = 'mcp';

export interface WebSocketTransportOptions {
  headers?: Record<string, string>;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf-8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  return Buffer.from(data).toString('utf-8');
}

export class WebSocketTransport implements Transport {
  private socket: WebSocket | null = null;

  onclose?: () => void;
  onerror?: (error: Error) => void;
  onmessage?: (message: JSONRPCMessage) => void;

  constructor(
    private readonly url: URL,
    private readonly options: WebSocketTransportOptions = {},
  ) {}

  start(): Promise<void> {
    if (this.socket) {
      return Promise.reject(new Error('WebSocketTransport already started'));
    }

    return new Promise<void>((resolve, reject) => {
      const socket = new WebSocket(this.url, [SUBPROTOCOL], { headers: this.options.headers });
      let opened = false;

      socket.on('open', () => {
        opened = true;
        resolve();
      });

      socket.on('error', (err: Error) => {
        if (!opened) {
          reject(err);
          return;
        }
        this.onerror?.(err);
      });

      socket.on('close', () => {
        this.socket = null;
        this.onclose?.();
      });

      socket.on('message', (data: WebSocket.RawData) => {
        let message: JSONRPCMessage;
        try {
          message = JSONRPCMessageSchema.parse(JSON.parse(rawDataToString(data)));
        } catch (err) {
          this.onerror?.(toError(err));
          return;
        }
        this.onmessage?.(message);
      });

      this.socket = socket;
    });
  }

  send(message: JSONRPCMessage): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new Error('WebSocket is not open'));
    }
    return new Promise<void>((resolve, reject) => {
      socket.send(JSON.stringify(message), (err?: Error) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  async close(): Promise<void> {
    this.socket?.close();
  }
}
