import type { Server as HttpServer } from 'node:http';
import { WebSocket, WebSocketServer, type RawData } from 'ws';
import { parseClientMessage } from './protocol.ts';
import type { HelloMsg, ServerMessage, WireAction } from './protocol.ts';

const DEFAULT_MAX_MESSAGE_BYTES = 16 * 1024;
const DEFAULT_MAX_BUFFERED_BYTES = 512 * 1024;

export interface ConnectionState {
  id: number;
  socket: WebSocket;
  /** Set once a valid hello opened a session. */
  opened: boolean;
}

export interface WsHubOptions {
  maxMessageBytes?: number;
  maxBufferedAmount?: number;
}

export interface WsHubHandlers {
  onHello?: (connId: number, msg: HelloMsg) => void;
  onReset?: (connId: number) => void;
  onStep?: (connId: number, action: WireAction) => void;
  onInput?: (connId: number, action: WireAction) => void;
  onQuit?: (connId: number) => void;
  onDisconnect?: (connId: number) => void;
  /** Socket-level failure, such as a frame over `maxMessageBytes`; ws closes the socket itself. */
  onSocketError?: (connId: number, err: Error) => void;
}

export class WsHub {
  private wss: WebSocketServer;
  private connections = new Map<number, ConnectionState>();
  private nextId = 1;
  private maxMessageBytes: number;
  private maxBufferedAmount: number;
  private handlers: WsHubHandlers | null;

  constructor(httpServer: HttpServer, options: WsHubOptions = {}, handlers?: WsHubHandlers) {
    this.maxMessageBytes = options.maxMessageBytes ?? DEFAULT_MAX_MESSAGE_BYTES;
    this.maxBufferedAmount = options.maxBufferedAmount ?? DEFAULT_MAX_BUFFERED_BYTES;
    this.wss = new WebSocketServer({
      server: httpServer,
      maxPayload: this.maxMessageBytes
    });
    this.handlers = handlers ?? null;
    this.wss.on('connection', (socket) => this.handleConnection(socket));
  }

  setHandlers(handlers: WsHubHandlers): void {
    this.handlers = handlers;
  }

  closeAll(): void {
    for (const state of this.connections.values()) {
      state.socket.close();
    }
    this.connections.clear();
    this.wss.close();
  }

  sendJsonTo(connId: number, payload: ServerMessage): void {
    const state = this.connections.get(connId);
    if (!state) return;
    if (state.socket.readyState !== WebSocket.OPEN) return;
    if (state.socket.bufferedAmount > this.maxBufferedAmount) return;
    state.socket.send(JSON.stringify(payload));
  }

  private handleConnection(socket: WebSocket): void {
    const state: ConnectionState = {
      id: this.nextId++,
      socket,
      opened: false
    };
    this.connections.set(state.id, state);
    socket.on('message', (data, isBinary) => this.handleMessage(state, data, isBinary));
    socket.on('error', (err) => this.handlers?.onSocketError?.(state.id, err));
    socket.on('close', () => {
      this.connections.delete(state.id);
      this.handlers?.onDisconnect?.(state.id);
    });
  }

  private handleMessage(state: ConnectionState, data: RawData, isBinary: boolean): void {
    const text = payloadToText(data);
    if (isBinary) {
      this.protocolError(state, 'binary messages are not supported');
      return;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      this.protocolError(state, 'invalid JSON');
      return;
    }
    const msg = parseClientMessage(parsed);
    if (!msg) {
      this.protocolError(state, 'invalid message');
      return;
    }
    if (msg.type === 'ping') return;
    if (msg.type === 'hello') {
      if (state.opened) {
        this.protocolError(state, 'duplicate hello');
        return;
      }
      state.opened = true;
      this.handlers?.onHello?.(state.id, msg);
      return;
    }
    if (!state.opened) {
      this.protocolError(state, 'hello required first');
      return;
    }
    switch (msg.type) {
      case 'reset':
        this.handlers?.onReset?.(state.id);
        return;
      case 'step':
        this.handlers?.onStep?.(state.id, msg.action);
        return;
      case 'input':
        this.handlers?.onInput?.(state.id, msg.action);
        return;
      case 'quit':
        this.handlers?.onQuit?.(state.id);
        return;
    }
  }

  private protocolError(state: ConnectionState, message: string): void {
    if (state.socket.readyState === WebSocket.OPEN) {
      state.socket.send(JSON.stringify({ type: 'error', message }));
    }
    state.socket.close(1008, message);
  }
}

function payloadToText(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}
