/**
 * backend/src/modules/cable/cable.server.ts
 *
 * WHY:
 * - Serves the cable endpoint on the same HTTP server as Fastify.
 * - Authentication runs on the upgrade request, before any frame is exchanged.
 *
 * PROTOCOL:
 * - URL: `<CABLE_PATH>?token=<access token>`. No header or cookie transport.
 * - Accepted: `{type:"welcome"}`, then client frames (see cable.schemas.ts).
 * - Rejected: the socket is upgraded, receives
 *   `{type:"disconnect", reason, reconnect:false}` and is closed with 4401.
 *
 * RULES:
 * - ws runs in noServer mode; we own the `upgrade` listener.
 * - Infrastructure failure during authentication answers 500 on the raw socket.
 * - The raw socket carries an error listener for as long as authentication is pending.
 */

import { randomUUID } from 'node:crypto';
import type { IncomingMessage, Server } from 'node:http';
import type { Duplex } from 'node:stream';
import { WebSocket, WebSocketServer, type RawData } from 'ws';

import type { Logger } from '../../shared/logger/logger';
import { withConnectionContext } from '../../shared/logger/with-context';
import { TenantContext } from '../../shared/tenancy/tenant-context';
import type { Identity, UserSummary } from '../auth/auth.types';
import type { ConnectionAuthenticator } from '../auth/connection-authenticator';
import type { MessageStore } from '../messages/message.store';
import { CableConnection, type CableTransport } from './cable.connection';
import type { ServerFrame } from './cable.types';
import type { ChannelAuthorizer } from './channel-authorizer';
import type { StreamBroker } from './stream-broker';

export const CLOSE_UNAUTHORIZED = 4401;
export const CLOSE_GOING_AWAY = 1001;

export type CableServerDeps = {
  path: string;
  maxPayloadBytes: number;
  authenticator: ConnectionAuthenticator;
  authorizer: ChannelAuthorizer;
  messages: MessageStore;
  broker: StreamBroker;
  logger: Logger;
};

function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

function sendFrame(socket: WebSocket, frame: ServerFrame): void {
  if (socket.readyState !== WebSocket.OPEN) return;
  socket.send(JSON.stringify(frame));
}

export function readConnectionToken(req: IncomingMessage): {
  pathname: string;
  token: string | null;
} {
  const url = new URL(req.url ?? '/', 'http://cable.local');
  return { pathname: url.pathname, token: url.searchParams.get('token') };
}

export class CableServer {
  private readonly wss: WebSocketServer;
  private readonly connections = new Set<CableConnection>();
  private attachedTo: Server | null = null;

  constructor(private readonly deps: CableServerDeps) {
    this.wss = new WebSocketServer({ noServer: true, maxPayload: deps.maxPayloadBytes });
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  attach(server: Server): void {
    if (this.attachedTo) return;
    server.on('upgrade', this.onUpgrade);
    this.attachedTo = server;
  }

  /** Closes every open connection with 1001 and stops accepting upgrades. */
  async close(): Promise<void> {
    this.attachedTo?.off('upgrade', this.onUpgrade);
    this.attachedTo = null;

    for (const connection of [...this.connections]) {
      connection.close(CLOSE_GOING_AWAY, 'Server shutting down');
    }
    this.connections.clear();

    await new Promise<void>((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private readonly onUpgrade = (req: IncomingMessage, socket: Duplex, head: Buffer): void => {
    const { pathname, token } = readConnectionToken(req);
    if (pathname !== this.deps.path) {
      socket.write('HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n');
      socket.destroy();
      return;
    }

    // Node drops the HTTP parser's error listener on upgrade. Until ws owns the
    // socket, a client reset must end this attempt only.
    const onSocketError = (err: Error) => {
      this.deps.logger.warn('cable.upgrade.socket_error', { err });
      socket.destroy();
    };
    socket.on('error', onSocketError);

    this.deps.authenticator
      .authenticate(token)
      .then((result) => {
        socket.off('error', onSocketError);
        if (socket.destroyed) return;

        this.wss.handleUpgrade(req, socket, head, (ws) => {
          if (result.status === 'rejected') {
            this.deps.logger.warn('cable.connection.rejected', { reason: result.reason });
            sendFrame(ws, { type: 'disconnect', reason: result.reason, reconnect: false });
            ws.close(CLOSE_UNAUTHORIZED, result.reason);
            return;
          }

          this.accept(ws, result.identity, result.user);
        });
      })
      .catch((err: unknown) => {
        socket.off('error', onSocketError);
        this.deps.logger.error('cable.connection.auth_failed', { err });
        if (socket.destroyed) return;
        socket.write('HTTP/1.1 500 Internal Server Error\r\nConnection: close\r\n\r\n');
        socket.destroy();
      });
  };

  private accept(ws: WebSocket, identity: Identity, sender: UserSummary): void {
    const id = randomUUID();
    const logger = withConnectionContext({
      connectionId: id,
      userId: identity.userId,
      organizationId: identity.organizationId,
    });

    const transport: CableTransport = {
      send: (frame) => sendFrame(ws, frame),
      close: (code, reason) => ws.close(code, reason),
    };

    const connection = new CableConnection({
      id,
      identity,
      sender,
      tenant: new TenantContext(identity),
      transport,
      authorizer: this.deps.authorizer,
      messages: this.deps.messages,
      broker: this.deps.broker,
      logger,
    });
    this.connections.add(connection);

    ws.on('message', (data) => {
      connection.receive(rawDataToString(data)).catch((err: unknown) => {
        logger.error('cable.frame.failed', { err });
        transport.send({ type: 'error', error: 'Internal error' });
      });
    });

    ws.on('close', () => {
      this.connections.delete(connection);
      connection.disconnect();
    });

    ws.on('error', (err) => {
      logger.warn('cable.connection.error', { err });
    });

    logger.info('cable.connection.accepted');
    connection.welcome();
  }
}
