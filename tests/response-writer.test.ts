import assert from 'node:assert/strict';
import { createServer, type Server } from 'node:http';
import { after, before, describe, it } from 'node:test';

import { ServerError } from '../src/errors.js';
import { content, errorResponse, html, redirect } from '../src/responses.js';
import {
  buildContentType,
  buildRedirectLocation,
  writeResponse,
} from '../src/response-writer.js';
import type { ResponseDescriptor } from '../src/types.js';
import { sendRequest } from './helpers.js';

describe('buildRedirectLocation', () => {
  it('prefixes the request host address when no public address is set', () => {
    assert.equal(
      buildRedirectLocation('/login', '', '10.0.0.5:8080'),
      'http://10.0.0.5:8080/login'
    );
  });

  it('prefers the public address', () => {
    assert.equal(
      buildRedirectLocation('/login', '1.2.3.4', '10.0.0.5:8080'),
      'http://1.2.3.4/login'
    );
  });
});

describe('buildContentType', () => {
  it('appends the charset to textual types', () => {
    assert.equal(buildContentType(html('<p/>')), 'text/html; charset=utf-8');
    assert.equal(
      buildContentType(content('{}', 'application/json', 'latin1')),
      'application/json; charset=iso-8859-1'
    );
  });

  it('leaves binary types and explicit charsets alone', () => {
    assert.equal(
      buildContentType(content(Buffer.from([1, 2]), 'image/png')),
      'image/png'
    );
    assert.equal(
      buildContentType(content('x', 'text/plain; charset=utf-8')),
      'text/plain; charset=utf-8'
    );
  });
});

describe('writeResponse', () => {
  let server: Server;
  let port = 0;
  let next: { descriptor: ResponseDescriptor; publicAddress: string };

  before(async () => {
    server = createServer((_req, res) => {
      writeResponse(res, next.descriptor, {
        publicAddress: next.publicAddress,
        hostAddress: '10.0.0.5:8080',
      });
    });
    await new Promise<void>((resolve) => {
      server.listen(0, '127.0.0.1', resolve);
    });
    const addr = server.address();
    port = typeof addr === 'object' && addr ? addr.port : 0;
  });

  after(async () => {
    await new Promise<void>((resolve) => {
      server.close(() => {
        resolve();
      });
    });
  });

  it('writes a redirect built from the request host', async () => {
    next = { descriptor: redirect('/login'), publicAddress: '' };

    const res = await sendRequest(port);

    assert.equal(res.status, 302);
    assert.equal(res.headers['location'], 'http://10.0.0.5:8080/login');
    assert.equal(res.body.length, 0);
  });

  it('writes a redirect built from the public address', async () => {
    next = { descriptor: redirect('/login'), publicAddress: '1.2.3.4' };

    const res = await sendRequest(port);

    assert.equal(res.status, 302);
    assert.equal(res.headers['location'], 'http://1.2.3.4/login');
  });

  it('writes content with explicit length and type', async () => {
    next = { descriptor: html('<h1>héllo</h1>'), publicAddress: '' };

    const res = await sendRequest(port);

    assert.equal(res.status, 200);
    assert.equal(res.headers['content-type'], 'text/html; charset=utf-8');
    assert.equal(res.headers['content-length'], '15');
    assert.equal(res.body.toString('utf8'), '<h1>héllo</h1>');
  });

  it('writes binary bodies verbatim', async () => {
    const bytes = Buffer.from([0, 255, 16, 32]);
    next = {
      descriptor: content(bytes, 'application/octet-stream'),
      publicAddress: '',
    };

    const res = await sendRequest(port);

    assert.equal(res.headers['content-type'], 'application/octet-stream');
    assert.deepEqual(res.body, bytes);
  });

  it('writes an error descriptor with an empty target as a redirect', async () => {
    next = {
      descriptor: errorResponse(ServerError.PageNotFound),
      publicAddress: '',
    };

    const res = await sendRequest(port);

    assert.equal(res.status, 302);
    assert.equal(res.headers['location'], 'http://10.0.0.5:8080');
  });
});
