import process from 'node:process';
import { parseArgs } from 'node:util';

import {
  content,
  type Dispatcher,
  errorResponse,
  hasValidToken,
  html,
  redirect,
  ServerError,
  startWebServer,
} from '../src/index.js';

function printUsage(): void {
  const usage = `
Usage:
  node --import tsx examples/hello-server.ts [options]

Options:
  --port <n>            Port to listen on (default: 8080)
  --host <address>      Bind address, repeatable (default: 127.0.0.1)
  --public <address>    Public address used in redirect locations
  --ttl <seconds>       Session expiration (default: 60)
  -h, --help            Show help
`;
  process.stderr.write(usage);
}

const page = (title: string, body: string): string =>
  `<!doctype html><html><head><title>${title}</title></head><body>${body}</body></html>`;

const dispatcher: Dispatcher = {
  route(session, verb, path, parameters) {
    if (path === '/') {
      const name = session.getString('name') ?? 'stranger';
      return html(
        page(
          'Hello',
          `<h1>Hello, ${name}</h1>
<form method="post" action="/name"><%AntiForgeryToken%>
<input name="name"/><button>Save</button></form>`
        )
      );
    }

    if (path === '/name' && verb === 'POST') {
      if (!hasValidToken(session, parameters)) {
        return errorResponse(ServerError.ValidationError);
      }
      const name = parameters.get('name')?.trim();
      if (name) session.set('name', name);
      return redirect('/');
    }

    if (path === '/time') {
      return content(new Date().toISOString(), 'text/plain');
    }

    if (path.startsWith('/error/')) {
      return html(page('Oops', `<p>${path.slice('/error/'.length)}</p>`));
    }

    return errorResponse(ServerError.PageNotFound);
  },
};

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      port: { type: 'string', default: '8080' },
      host: { type: 'string', multiple: true },
      public: { type: 'string' },
      ttl: { type: 'string', default: '60' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  if (values.help) {
    printUsage();
    return;
  }

  const server = await startWebServer({
    dispatcher,
    onError: (kind) => `/error/${kind}`,
    port: Number(values.port),
    bindAddresses: values.host ?? ['127.0.0.1'],
    publicAddress: values.public,
    sessionExpirationSeconds: Number(values.ttl),
  });

  const stop = (signal: string): void => {
    server.shutdown(signal).then(
      () => process.exit(0),
      (error: unknown) => {
        process.stderr.write(`Shutdown failed: ${String(error)}\n`);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', () => {
    stop('SIGINT');
  });
  process.once('SIGTERM', () => {
    stop('SIGTERM');
  });

  await server.closed;
}

main().catch((error: unknown) => {
  process.stderr.write(
    `${error instanceof Error ? error.message : String(error)}\n`
  );
  process.exitCode = 1;
});
