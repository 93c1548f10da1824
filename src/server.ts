import { ConnectionAdmission, type Permit } from './admission.js';
import {
  resolveServerOptions,
  type ServerOptions,
  type ServerOptionsInput,
} from './config.js';
import { ListenerClosedError, toError } from './errors.js';
import { defaultBindAddresses } from './host.js';
import { type BoundAddress, ConnectionListener } from './listener.js';
import { logError, logInfo } from './observability.js';
import { RequestPipeline } from './pipeline.js';
import {
  createSessionStore,
  type SessionStore,
  startSessionSweep,
} from './session.js';

export interface WebServer {
  readonly addresses: readonly BoundAddress[];
  readonly port: number;
  readonly options: ServerOptions;
  readonly sessions: SessionStore;
  readonly admission: ConnectionAdmission;
  readonly listener: ConnectionListener;
  /**
   * Settles when the accept loop stops: resolves after `shutdown()`, rejects
   * with the listener's error when accepting fails.
   */
  readonly closed: Promise<void>;
  shutdown: (signal?: string) => Promise<void>;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Acquire a permit, start a handler that waits for the next connection,
 * repeat. Handlers run independently of each other and of this loop.
 */
class AcceptLoop {
  private readonly controller = new AbortController();
  private readonly inFlight = new Set<Promise<void>>();
  private fatal: Error | undefined;

  constructor(
    private readonly admission: ConnectionAdmission,
    private readonly pipeline: RequestPipeline
  ) {}

  async run(): Promise<void> {
    const { signal } = this.controller;

    while (!signal.aborted) {
      let permit: Permit;
      try {
        permit = await this.admission.acquire(signal);
      } catch (error) {
        if (isAbortError(error) || signal.aborted) break;
        throw error;
      }

      const task = this.pipeline
        .serve(permit)
        .catch((error: unknown) => {
          this.handleAcceptFailure(error);
        })
        .finally(() => {
          this.inFlight.delete(task);
        });
      this.inFlight.add(task);
    }

    if (this.fatal) throw this.fatal;
  }

  stop(): void {
    this.controller.abort();
  }

  async drain(): Promise<void> {
    await Promise.allSettled([...this.inFlight]);
  }

  private handleAcceptFailure(error: unknown): void {
    if (error instanceof ListenerClosedError) return;
    if (!this.fatal) {
      this.fatal = toError(error);
      logError('Listener failed; accept loop stopping', this.fatal);
    }
    this.controller.abort();
  }
}

export async function startWebServer(
  input: ServerOptionsInput
): Promise<WebServer> {
  const options = resolveServerOptions(input);

  const sessions = createSessionStore({
    expirationSeconds: options.sessionExpirationSeconds,
    nowMs: options.nowMs,
  });
  const admission = new ConnectionAdmission(options.maxSimultaneousConnections);
  const listener = new ConnectionListener({
    port: options.port,
    bindAddresses: options.bindAddresses ?? defaultBindAddresses(),
    requestTimeoutMs: options.requestTimeoutMs,
  });
  const pipeline = new RequestPipeline({ options, sessions, source: listener });

  logInfo(`public address: ${options.publicAddress || '(request host)'}`);

  let addresses: BoundAddress[];
  try {
    addresses = await listener.listen();
  } catch (error) {
    await listener.close();
    throw error;
  }

  const sweep = startSessionSweep(
    sessions,
    options.sessionRetentionSeconds * 1000
  );
  const loop = new AcceptLoop(admission, pipeline);
  const closed = loop.run();

  let shuttingDown: Promise<void> | undefined;

  const shutdown = async (signal = 'shutdown'): Promise<void> => {
    logInfo(`Stopping HTTP server (${signal})...`);
    loop.stop();
    sweep.abort();
    await listener.close();
    await loop.drain();
    sessions.clear();
  };

  return {
    addresses,
    port: addresses[0]?.port ?? options.port,
    options,
    sessions,
    admission,
    listener,
    closed,
    shutdown: (signal) => {
      shuttingDown ??= shutdown(signal);
      return shuttingDown;
    },
  };
}
