import {
  createServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from 'node:http';

import { ListenerClosedError, toError } from './errors.js';
import { FifoQueue } from './fifo-queue.js';
import { formatEndpoint } from './host.js';
import { logInfo, logWarn } from './observability.js';
import {
  applyHttpServerTuning,
  drainConnectionsOnShutdown,
  type HttpServerTuning,
} from './server-tuning.js';

export interface Connection {
  readonly request: IncomingMessage;
  readonly response: ServerResponse;
}

export interface BoundAddress {
  readonly address: string;
  readonly port: number;
  readonly url: string;
}

export interface ConnectionListenerOptions extends HttpServerTuning {
  readonly port: number;
  readonly bindAddresses: readonly string[];
}

interface AcceptWaiter {
  readonly resolve: (connection: Connection) => void;
  readonly reject: (error: Error) => void;
}

/**
 * Binds one HTTP server per address on a shared port and exposes inbound
 * requests through `accept()`. Requests that arrive while nobody is waiting
 * are held in arrival order.
 */
export class ConnectionListener {
  private readonly httpServers: Server[] = [];
  private readonly backlog = new FifoQueue<Connection>();
  private readonly waiters = new FifoQueue<AcceptWaiter>();
  private failure: Error | undefined;
  private closed = false;

  constructor(private readonly options: ConnectionListenerOptions) {}

  /** The bound `http.Server` instances, one per bind address. */
  get servers(): readonly Server[] {
    return this.httpServers;
  }

  get pendingConnections(): number {
    return this.backlog.length;
  }

  get pendingAccepts(): number {
    return this.waiters.length;
  }

  async listen(): Promise<BoundAddress[]> {
    if (this.httpServers.length > 0) {
      throw new Error('Listener is already started');
    }

    const bound: BoundAddress[] = [];
    let port = this.options.port;

    for (const address of this.options.bindAddresses) {
      const server = createServer((request, response) => {
        this.enqueue({ request, response });
      });
      applyHttpServerTuning(server, this.options);

      port = await listenOn(server, port, address);
      server.on('error', (error) => {
        this.fail(error);
      });
      this.httpServers.push(server);

      const url = `http://${formatEndpoint(address, port)}/`;
      logInfo(`Listening on ${url}`);
      bound.push({ address, port, url });
    }

    return bound;
  }

  /** Resolves with the next inbound connection; rejects once the listener fails or closes. */
  accept(): Promise<Connection> {
    if (this.failure) return Promise.reject(this.failure);
    if (this.closed) return Promise.reject(new ListenerClosedError());

    const queued = this.backlog.shift();
    if (queued) return Promise.resolve(queued);

    return new Promise<Connection>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    for (const waiter of this.waiters.drain()) {
      waiter.reject(new ListenerClosedError());
    }
    this.refuseBacklog();

    await Promise.all(
      this.httpServers.map(
        (server) =>
          new Promise<void>((resolve) => {
            server.close(() => {
              resolve();
            });
            drainConnectionsOnShutdown(server);
          })
      )
    );
    this.httpServers.length = 0;
  }

  private enqueue(connection: Connection): void {
    if (this.closed || this.failure) {
      refuse(connection);
      return;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(connection);
      return;
    }
    this.backlog.push(connection);
  }

  private fail(error: unknown): void {
    if (this.failure || this.closed) return;
    this.failure = toError(error);

    for (const waiter of this.waiters.drain()) {
      waiter.reject(this.failure);
    }
    this.refuseBacklog();
  }

  private refuseBacklog(): void {
    const pending = this.backlog.drain();
    if (pending.length === 0) return;

    logWarn('Refusing queued connections', { count: pending.length });
    for (const connection of pending) refuse(connection);
  }
}

function refuse({ response }: Connection): void {
  if (response.writableEnded) return;
  response.statusCode = 503;
  response.setHeader('Connection', 'close');
  response.end();
}

function listenOn(server: Server, port: number, host: string): Promise<number> {
  return new Promise<number>((resolve, reject) => {
    const onError = (error: Error): void => {
      server.off('listening', onListening);
      reject(error);
    };
    const onListening = (): void => {
      server.off('error', onError);
      const addr = server.address();
      resolve(typeof addr === 'object' && addr ? addr.port : port);
    };
    server.once('error', onError);
    server.once('listening', onListening);
    server.listen(port, host);
  });
}
