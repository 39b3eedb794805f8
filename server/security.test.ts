import { describe, it, expect } from 'vitest';
import WebSocket, { type RawData } from 'ws';
import { startServer } from './index.ts';
import { DEFAULT_CONFIG } from './config.ts';
import { createLogger } from './logger.ts';

type Server = Awaited<ReturnType<typeof startServer>>;

async function startQuietServer(): Promise<Server | null> {
  try {
    return await startServer(
      { ...DEFAULT_CONFIG, port: 0, dbPath: ':memory:', logLevel: 'error' },
      createLogger('error', () => {})
    );
  } catch (err) {
    if (typeof err === 'object' && err !== null && 'code' in err && err.code === 'EPERM') return null;
    throw err;
  }
}

/**
 * Connects, runs `send`, and resolves with the first error frame and the close code.
 * @param url - WebSocket URL.
 * @param send - Called once the socket is open.
 */
function expectRejection(url: string, send: (ws: WebSocket) => void): Promise<{ message: string; code: number }> {
  return new Promise((resolve, reject) => {
    const ws = new WebSocket(url);
    let message = '';
    const timer = setTimeout(() => {
      ws.terminate();
      reject(new Error('socket was not closed'));
    }, 5000);
    ws.on('message', (data: RawData) => {
      if (!Buffer.isBuffer(data)) return;
      const parsed: unknown = JSON.parse(data.toString('utf8'));
      if (typeof parsed === 'object' && parsed !== null && 'type' in parsed && parsed.type === 'error' && 'message' in parsed) {
        message = String(parsed.message);
      }
    });
    ws.on('open', () => send(ws));
    ws.on('error', reject);
    ws.on('close', (code) => {
      clearTimeout(timer);
      resolve({ message, code });
    });
  });
}

describe('server security', () => {
  it('rejects malformed JSON without crashing', async () => {
    const server = await startQuietServer();
    if (!server) return;
    try {
      const result = await expectRejection(server.wsUrl, ws => ws.send('{not json'));
      expect(result).toEqual({ message: 'invalid JSON', code: 1008 });
      const health = await fetch(`${server.httpUrl}/health`);
      expect(health.status).toBe(200);
    } finally {
      await server.close();
    }
  });

  it('closes a connection whose frame exceeds the size limit and keeps serving', async () => {
    const server = await startQuietServer();
    if (!server) return;
    try {
      const result = await expectRejection(server.wsUrl, ws => ws.send('x'.repeat(20000)));
      expect(result).toEqual({ message: '', code: 1009 });
      const health = await fetch(`${server.httpUrl}/health`);
      expect(health.status).toBe(200);
      const again = await expectRejection(server.wsUrl, ws => ws.send('{not json'));
      expect(again).toEqual({ message: 'invalid JSON', code: 1008 });
    } finally {
      await server.close();
    }
  });

  it('rejects binary frames', async () => {
    const server = await startQuietServer();
    if (!server) return;
    try {
      const result = await expectRejection(server.wsUrl, ws => ws.send(Buffer.from('{}'), { binary: true }));
      expect(result).toEqual({ message: 'binary messages are not supported', code: 1008 });
    } finally {
      await server.close();
    }
  });

  it('rejects a second hello on the same connection', async () => {
    const server = await startQuietServer();
    if (!server) return;
    try {
      const hello = JSON.stringify({ type: 'hello', version: 1, mode: 'agent' });
      const result = await expectRejection(server.wsUrl, ws => {
        ws.send(hello);
        ws.send(hello);
      });
      expect(result).toEqual({ message: 'duplicate hello', code: 1008 });
    } finally {
      await server.close();
    }
  });

  it('rejects an unsupported protocol version', async () => {
    const server = await startQuietServer();
    if (!server) return;
    try {
      const result = await expectRejection(server.wsUrl, ws =>
        ws.send(JSON.stringify({ type: 'hello', version: 99, mode: 'agent' }))
      );
      expect(result).toEqual({ message: 'invalid message', code: 1008 });
    } finally {
      await server.close();
    }
  });
});
