import { createServer } from 'node:http';
import { pathToFileURL } from 'node:url';
import { normalizeGameConfig } from '../src/config.ts';
import { parseConfig, type ServerConfig } from './config.ts';
import { hashConfig } from './hash.ts';
import { createHttpHandler } from './httpApi.ts';
import { createLogger, type Logger } from './logger.ts';
import { MatchServer } from './matchServer.ts';
import { createPersistence, initDb } from './persistence.ts';
import { WsHub } from './wsHub.ts';

export interface RunningServer {
  port: number;
  wsUrl: string;
  httpUrl: string;
  close: () => Promise<void>;
}

export async function startServer(
  config: ServerConfig,
  logger: Logger = createLogger(config.logLevel)
): Promise<RunningServer> {
  const cfgHash = hashConfig(
    normalizeGameConfig({
      boardSize: config.boardSize,
      localState: config.localState,
      relativeActions: config.relativeActions
    })
  );
  const db = initDb(config.dbPath);
  const persistence = createPersistence(db);

  let matchServer: MatchServer | null = null;
  const httpHandler = createHttpHandler({
    getStatus: () => ({
      tick: matchServer?.getTickId() ?? 0,
      sessions: matchServer?.getSessionCount() ?? 0
    }),
    persistence,
    config,
    logger
  });

  const httpServer = createServer((req, res) => {
    httpHandler(req, res);
  });

  const wsHub = new WsHub(httpServer);
  const server = new MatchServer(config, wsHub, logger, cfgHash);
  matchServer = server;
  wsHub.setHandlers({
    onHello: (connId, msg) => server.handleHello(connId, msg),
    onReset: (connId) => server.handleReset(connId),
    onStep: (connId, action) => server.handleStep(connId, action),
    onInput: (connId, action) => server.handleInput(connId, action),
    onQuit: (connId) => server.handleQuit(connId),
    onDisconnect: (connId) => server.handleDisconnect(connId),
    onSocketError: (connId, err) => logger.warn('ws', `connection ${connId}: ${err.message}`)
  });

  await new Promise<void>((resolve, reject) => {
    const onError = (err: Error) => {
      httpServer.off('error', onError);
      reject(err);
    };
    httpServer.once('error', onError);
    httpServer.listen({ port: config.port, host: config.host }, () => {
      httpServer.off('error', onError);
      resolve();
    });
  });

  const address = httpServer.address();
  const port = typeof address === 'object' && address ? address.port : config.port;

  server.start();

  const close = async () => {
    server.stop();
    wsHub.closeAll();
    await new Promise<void>((resolve) => httpServer.close(() => resolve()));
    db.close();
  };

  const host =
    config.host === '0.0.0.0' || config.host === '::' ? 'localhost' : config.host;
  return {
    port,
    wsUrl: `ws://${host}:${port}`,
    httpUrl: `http://${host}:${port}`,
    close
  };
}

export async function main(): Promise<void> {
  const config = parseConfig(process.argv.slice(2), process.env);
  const logger = createLogger(config.logLevel);
  const server = await startServer(config, logger);
  logger.info(
    'server',
    `listening on :${server.port} (board ${config.boardSize}, ${config.relativeActions ? 'relative' : 'absolute'} actions)`
  );

  let closing = false;
  const shutdown = async () => {
    if (closing) return;
    closing = true;
    logger.info('server', 'shutting down');
    await server.close();
    process.exit(0);
  };
  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? '').href) {
  main().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
