import { createServer, type IncomingMessage, type Server } from 'http';
import type { AddressInfo } from 'net';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { TransportError } from '../../src/errors.js';
import { HttpClient } from '../../src/http-client.js';

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = '';
    req.on('data', (chunk: Buffer) => {
      data += chunk.toString();
    });
    req.on('end', () => resolve(data));
    req.on('error', reject);
  });
}

function listen(server: Server): Promise<number> {
  return new Promise((resolve) => {
    server.listen(0, '127.0.0.1', () => {
      const address: AddressInfo | string | null = server.address();
      resolve(address !== null && typeof address === 'object' ? address.port : 0);
    });
  });
}

function close(server: Server): Promise<void> {
  server.closeAllConnections();
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

let server: Server;
let baseUrl = '';

beforeAll(async () => {
  server = createServer((req, res) => {
    if (req.url === '/slow') {
      setTimeout(() => res.end('late'), 500);
      return;
    }
    if (req.url === '/missing') {
      res.writeHead(404, { 'content-type': 'text/plain' });
      res.end('nope');
      return;
    }
    readBody(req).then(
      (body) => {
        res.writeHead(201, { 'content-type': 'application/json', 'x-reply': 'yes' });
        res.end(JSON.stringify({
          method: req.method,
          body,
          test: req.headers['x-test'],
          client: req.headers['x-client'],
        }));
      },
      (error: unknown) => {
        res.writeHead(500);
        res.end(String(error));
      }
    );
  });
  baseUrl = `http://127.0.0.1:${await listen(server)}`;
});

afterAll(() => close(server));

describe('HttpClient', () => {
  it('sends the request and returns status, headers and body', async () => {
    const client = new HttpClient({ headers: { 'x-client': 'stampede' } });
    const response = await client.send({
      method: 'POST',
      url: `${baseUrl}/echo`,
      headers: { 'x-test': '1' },
      body: '{"a":1}',
      timeoutMs: 2_000,
    });
    expect(response.status).toBe(201);
    expect(response.headers['x-reply']).toBe('yes');
    expect(JSON.parse(response.body)).toEqual({ method: 'POST', body: '{"a":1}', test: '1', client: 'stampede' });
  });

  it('resolves error statuses instead of rejecting', async () => {
    const response = await new HttpClient().send({ method: 'GET', url: `${baseUrl}/missing`, headers: {}, timeoutMs: 2_000 });
    expect(response.status).toBe(404);
    expect(response.body).toBe('nope');
  });

  it('lets the transform rewrite the outgoing request', async () => {
    const client = new HttpClient({
      transform: (req) => {
        const headers = new Headers(req.headers);
        headers.set('x-test', 'rewritten');
        return new Request(req, { headers });
      },
    });
    const response = await client.send({ method: 'GET', url: `${baseUrl}/echo`, headers: { 'x-test': '1' }, timeoutMs: 2_000 });
    expect(JSON.parse(response.body)).toMatchObject({ test: 'rewritten' });
  });

  it('times out slow responses', async () => {
    const sending = new HttpClient().send({ method: 'GET', url: `${baseUrl}/slow`, headers: {}, timeoutMs: 50 });
    await expect(sending).rejects.toBeInstanceOf(TransportError);
    await expect(sending).rejects.toMatchObject({ kind: 'timeout', message: 'Timeout after 50ms' });
  });

  it('reports an aborted request as a connection failure', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(new HttpClient().send({
      method: 'GET',
      url: `${baseUrl}/slow`,
      headers: {},
      timeoutMs: 2_000,
      signal: controller.signal,
    })).rejects.toMatchObject({ kind: 'connection', message: 'Request aborted' });
  });

  it('classifies a refused connection', async () => {
    const closed = createServer();
    const port = await listen(closed);
    await close(closed);
    await expect(new HttpClient().send({ method: 'GET', url: `http://127.0.0.1:${port}/`, headers: {}, timeoutMs: 2_000 }))
      .rejects.toMatchObject({ kind: 'connection' });
  });

  it('rejects a malformed request as a protocol error', async () => {
    await expect(new HttpClient().send({ method: 'NOT VALID', url: `${baseUrl}/echo`, headers: {}, timeoutMs: 2_000 }))
      .rejects.toMatchObject({ kind: 'protocol' });
  });
});
