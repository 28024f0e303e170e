// packages/server/src/gateway/server.ts
import { getEventBus } from '@blockbridge/infra';
import type { ResolvedConfig } from '@blockbridge/types';
import { createServer, type Server as HttpServer, type IncomingMessage, type ServerResponse } from 'node:http';
import { WebSocketServer, type WebSocket } from 'ws';
import { createGatewayContext, type GatewayContext, type GatewayDeps } from './context.js';
import { handleHttpRequest } from './router.js';
import { CloseCodes } from './session/transport.js';
import { handleWsConnection } from './ws/connection.js';

export interface GatewayServer {
  readonly httpServer: HttpServer;
  readonly wss: WebSocketServer;
  readonly ctx: GatewayContext;
  /** Bound port once listening (useful with port 0) */
  readonly port: number;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export function createGatewayServer(config: ResolvedConfig, deps: GatewayDeps): GatewayServer {
  const ctx = createGatewayContext(config, deps);
  const logger = ctx.logger;

  const httpServer = createServer();

  // game servers dial in on gateway.path; everything else is the control plane
  const wss = new WebSocketServer({
    server: httpServer,
    path: config.gateway.path,
    maxPayload: config.gateway.maxPayloadBytes,
  });

  httpServer.on('request', (req: IncomingMessage, res: ServerResponse) => {
    void handleHttpRequest(req, res, ctx);
  });

  wss.on('connection', (ws: WebSocket, req: IncomingMessage) => {
    // the new socket is already counted in wss.clients
    if (wss.clients.size > config.gateway.maxConnections) {
      logger.warn(`Refusing connection from ${req.socket.remoteAddress ?? 'unknown'}: connection limit reached`);
      ws.close(CloseCodes.TRY_AGAIN_LATER, 'Too many connections');
      return;
    }
    handleWsConnection(ws, req, ctx);
  });

  wss.on('error', (err: Error) => {
    logger.error(`WebSocket server error: ${err.message}`);
  });

  let stopped = false;

  return {
    httpServer,
    wss,
    ctx,

    get port(): number {
      const address = httpServer.address();
      return typeof address === 'object' && address !== null ? address.port : config.gateway.port;
    },

    async start(): Promise<void> {
      await new Promise<void>((resolve, reject) => {
        httpServer.once('error', reject);
        httpServer.listen(config.gateway.port, config.gateway.host, () => {
          httpServer.off('error', reject);
          resolve();
        });
      });

      const address = httpServer.address();
      const port = typeof address === 'object' && address !== null ? address.port : config.gateway.port;
      logger.info(`Gateway listening on ${config.gateway.host}:${port}${config.gateway.path}`);
      getEventBus().emit('gateway:start', port);

      ctx.sessions.start();
      ctx.binding.start();
      ctx.status.startPolling();
    },

    async stop(): Promise<void> {
      if (stopped) {
        return;
      }
      stopped = true;

      // 1. sessions close their sockets with 1001 and stop retrying
      ctx.dispose();

      // 2. sockets that never reached a session; closing ones finish their handshake
      for (const client of wss.clients) {
        if (client.readyState === client.OPEN) {
          client.terminate();
        }
      }

      // 3. listeners
      await new Promise<void>((resolve) => {
        wss.close(() => resolve());
      });
      await new Promise<void>((resolve, reject) => {
        if (!httpServer.listening) {
          resolve();
          return;
        }
        httpServer.close((err) => (err ? reject(err) : resolve()));
        httpServer.closeAllConnections();
      });

      logger.info('Gateway stopped');
      getEventBus().emit('gateway:stop');
    },
  };
}
