import { createServer, Socket, Server } from 'net';
import os from 'os';

import { handleConnection, ClientConnection } from './connection';
import logger from '../utils/logger';
import { ServerConfig } from '../config/server.config';

export type HttpServerOptions = Pick<
  ServerConfig,
  'port' | 'hostname' | 'rootDir' | 'defaultDocument' | 'maxHeaderBytes' | 'headerTimeoutMs'
>;

export class HttpServer {
  // allowHalfOpen lets a client that shuts down its write side after an
  // unterminated head still get an answer. handleConnection destroys the socket.
  private server: Server = createServer({ allowHalfOpen: true });
  private readonly connections = new Set<ClientConnection>();

  constructor(private readonly options: HttpServerOptions) {
    this.setupServer();
  }

  private setupServer() {
    this.server.on('connection', (socket: Socket) => this.onConnection(socket));

    this.server.on('error', (err: NodeJS.ErrnoException) => {
      logger.error(`Server error:`, {
        error: err.message,
        code: err.code,
        stack: err.stack,
      });
    });
  }

  private onConnection(socket: ClientConnection) {
    this.connections.add(socket);
    socket.once('close', () => {
      this.connections.delete(socket);
      logger.debug('Socket closed', {
        remoteAddress: socket.remoteAddress,
        remainingConnections: this.connections.size,
      });
    });

    socket.on('error', (err: NodeJS.ErrnoException) => {
      logger.error(`Socket error:`, {
        error: err.message,
        code: err.code,
        remoteAddress: socket.remoteAddress,
      });
    });

    logger.debug('New connection established.', {
      remoteAddress: socket.remoteAddress,
      activeConnections: this.connections.size,
    });

    handleConnection(socket, {
      rootDir: this.options.rootDir,
      defaultDocument: this.options.defaultDocument,
      maxHeaderBytes: this.options.maxHeaderBytes,
      headerTimeoutMs: this.options.headerTimeoutMs,
    }).catch((err: unknown) => {
      logger.error('Unhandled connection failure', {
        error: err instanceof Error ? err.message : String(err),
      });
      if (!socket.destroyed) socket.destroy();
    });
  }

  /**
   * Gets all available network addresses for the server
   * @returns An object with local and network addresses
   */
  private getNetworkUrls(): { local: string[]; network: string[] } {
    const port = this.boundPort();
    const addresses: { local: string[]; network: string[] } = {
      local: [`http://localhost:${port}`],
      network: [],
    };

    for (const infos of Object.values(os.networkInterfaces())) {
      for (const info of infos ?? []) {
        // Filter for IPv4 non-internal addresses
        if (info.family === 'IPv4' && !info.internal) {
          addresses.network.push(`http://${info.address}:${port}`);
        }
      }
    }

    return addresses;
  }

  private boundPort(): number {
    const address = this.server.address();
    return address && typeof address === 'object' ? address.port : this.options.port;
  }

  /**
   * Gracefully shuts down the server and every open TCP socket.
   */
  public async stop(): Promise<void> {
    logger.info('🛑  Shutting down HTTP server');

    const socketClosePromises = Array.from(this.connections).map(
      (sock) =>
        new Promise<void>((resolve) => {
          sock.once('close', () => resolve());
          sock.destroy();
        }),
    );

    let timeoutId: NodeJS.Timeout | undefined = undefined;
    await Promise.race([
      Promise.all(socketClosePromises),
      new Promise((resolve) => {
        timeoutId = setTimeout(resolve, 100);
      }),
    ]);
    if (timeoutId) clearTimeout(timeoutId);

    return new Promise<void>((resolve, reject) => {
      this.server.close((err) => {
        if (err && (err as NodeJS.ErrnoException).code !== 'ERR_SERVER_NOT_RUNNING') {
          logger.error('Error closing server:', { error: err.message });
          reject(err);
        } else {
          logger.info('Server closed successfully');
          resolve();
        }
      });
    });
  }

  /**
   * Destroys all active sockets without closing the listener.
   */
  public destroySockets(): void {
    this.connections.forEach((socket) => socket.destroy());
  }

  public get activeConnections(): number {
    return this.connections.size;
  }

  public start(): Promise<Server> {
    return new Promise((resolve, reject) => {
      const onError = (err: NodeJS.ErrnoException) => reject(err);
      this.server.once('error', onError);

      this.server.once('listening', () => {
        this.server.off('error', onError);
        const urls = this.getNetworkUrls();

        logger.info(`🚀 Serving ${this.options.rootDir} on port ${this.boundPort()}`);
        logger.info('Local URLs:');
        urls.local.forEach((url) => logger.info(`  - ${url}`));

        if (urls.network.length > 0) {
          logger.info('Network URLs (for access from other devices):');
          urls.network.forEach((url) => logger.info(`  - ${url}`));
        } else {
          logger.info('No network URLs available (not connected to any networks)');
        }

        resolve(this.server);
      });

      this.server.listen(this.options.port, this.options.hostname);
    });
  }
}
