import { readFileSync } from 'fs';
import { join } from 'path';
import * as net from 'net';
import * as tls from 'tls';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { TlsTransport } from '../index';
import { ErrorCategory, GeminiError, GeminiErrorKind, isGeminiError } from '../../errors';
import { GeminiConfigOptions, TlsVersion, createGeminiConfig } from '../../config';
import { parseUrl } from '../../types';

const key = readFileSync(join(__dirname, 'fixtures', 'capsule-key.pem'));
const cert = readFileSync(join(__dirname, 'fixtures', 'capsule-cert.pem'));

interface Capsule {
  port: number;
  requests: string[];
  /** SNI names sent by clients; IP literals send none. */
  servernames: string[];
  ended: boolean;
}

const servers: net.Server[] = [];
const sockets: net.Socket[] = [];

afterEach(async () => {
  for (const socket of sockets.splice(0)) {
    socket.destroy();
  }
  await Promise.all(
    servers.splice(0).map((server) => new Promise<void>((resolve) => server.close(() => resolve())))
  );
});

async function listen(server: net.Server): Promise<number> {
  servers.push(server);
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
  const address = server.address();
  return typeof address === 'object' && address !== null ? address.port : 0;
}

function track(socket: net.Socket): void {
  sockets.push(socket);
  socket.on('error', () => undefined);
}

/**
 * TLS capsule that answers each request line through the handler.
 */
async function startCapsule(
  onRequest: (socket: tls.TLSSocket, line: string) => void,
  options: tls.TlsOptions = {}
): Promise<Capsule> {
  const capsule: Capsule = { port: 0, requests: [], servernames: [], ended: false };
  const context = tls.createSecureContext({ key, cert });
  const SNICallback = (servername: string, done: (err: Error | null, ctx?: tls.SecureContext) => void): void => {
    capsule.servernames.push(servername);
    done(null, context);
  };
  const server = tls.createServer({ key, cert, SNICallback, ...options }, (socket) => {
    track(socket);
    let received = '';
    let answered = false;
    socket.on('data', (chunk: Buffer) => {
      received += chunk.toString('utf-8');
      const lf = received.indexOf('\n');
      if (lf !== -1 && !answered) {
        answered = true;
        const line = received.slice(0, lf + 1);
        capsule.requests.push(line);
        onRequest(socket, line);
      }
    });
    socket.on('end', () => {
      capsule.ended = true;
    });
  });
  capsule.port = await listen(server);
  return capsule;
}

/**
 * Plain TCP server; the handler decides what, if anything, to send.
 */
async function startPlainServer(onConnection: (socket: net.Socket) => void): Promise<number> {
  const server = net.createServer((socket) => {
    track(socket);
    onConnection(socket);
  });
  return listen(server);
}

function createTransport(options: GeminiConfigOptions = {}): TlsTransport {
  return new TlsTransport(createGeminiConfig({ readTimeout: 2000, ...options }));
}

async function captureError(promise: Promise<unknown>): Promise<GeminiError> {
  try {
    await promise;
  } catch (err) {
    if (isGeminiError(err)) {
      return err;
    }
    throw err;
  }
  throw new Error('expected an error');
}

describe('TlsTransport over TLS', () => {
  it('should complete a request with half-close', async () => {
    const capsule = await startCapsule((socket) => {
      socket.end('20 text/gemini\r\n# Hi\r\n=> /x there\r\n');
    });

    const { statusLine, body } = await createTransport().connectAndSend(
      parseUrl(`gemini://127.0.0.1:${capsule.port}/page`),
      undefined,
      new AbortController().signal
    );
    const lines: string[] = [];
    for await (const line of body.lines()) {
      lines.push(line.toString());
    }

    expect(statusLine).toBe('20 text/gemini');
    expect(lines).toEqual(['# Hi', '=> /x there']);
    expect(capsule.requests).toEqual([`gemini://127.0.0.1:${capsule.port}/page\r\n`]);
    expect(capsule.servernames).toEqual([]);
    await vi.waitFor(() => expect(capsule.ended).toBe(true));
  });

  it('should send the SNI override', async () => {
    const capsule = await startCapsule((socket) => {
      socket.end('20 text/plain\r\n');
    });

    await createTransport({ tls: { sniOverride: 'capsule.test' } }).connectAndSend(
      parseUrl(`gemini://127.0.0.1:${capsule.port}/`),
      undefined,
      new AbortController().signal
    );

    expect(capsule.servernames).toEqual(['capsule.test']);
  });

  it('should fail when the capsule closes before the status line', async () => {
    const capsule = await startCapsule((socket) => {
      socket.end();
    });

    const error = await captureError(
      createTransport().connectAndSend(
        parseUrl(`gemini://127.0.0.1:${capsule.port}/`),
        undefined,
        new AbortController().signal
      )
    );

    expect(error.kind).toBe(GeminiErrorKind.ProtocolViolation);
    expect(error.message).toBe('Connection closed before a status line was received');
  });

  it('should map a handshake with a plain TCP server to a TLS failure', async () => {
    const port = await startPlainServer((socket) => {
      socket.end('HTTP/1.1 400 Bad Request\r\n\r\n');
    });

    const error = await captureError(
      createTransport().connectAndSend(
        parseUrl(`gemini://127.0.0.1:${port}/`),
        undefined,
        new AbortController().signal
      )
    );

    expect(error.kind).toBe(GeminiErrorKind.TlsHandshakeFailed);
    expect(error.category()).toBe(ErrorCategory.Connection);
    expect(error.message.startsWith(`TLS handshake with 127.0.0.1:${port} failed: `)).toBe(true);
  });

  it('should refuse capsules below the minimum TLS version', async () => {
    const capsule = await startCapsule(
      (socket) => {
        socket.end('20 text/plain\r\n');
      },
      { maxVersion: 'TLSv1.2' }
    );

    const error = await captureError(
      createTransport({ tls: { minVersion: TlsVersion.Tls13 } }).connectAndSend(
        parseUrl(`gemini://127.0.0.1:${capsule.port}/`),
        undefined,
        new AbortController().signal
      )
    );

    expect(error.kind).toBe(GeminiErrorKind.TlsHandshakeFailed);
    expect(capsule.requests).toEqual([]);
  });

  it('should reject self-signed certificates when verification is on', async () => {
    const capsule = await startCapsule((socket) => {
      socket.end('20 text/plain\r\n');
    });

    const error = await captureError(
      createTransport({ tls: { verifyCertificate: true } }).connectAndSend(
        parseUrl(`gemini://127.0.0.1:${capsule.port}/`),
        undefined,
        new AbortController().signal
      )
    );

    expect(error.kind).toBe(GeminiErrorKind.TlsHandshakeFailed);
    expect(capsule.requests).toEqual([]);
  });

  it('should time out a handshake that never completes', async () => {
    const port = await startPlainServer(() => undefined);

    const error = await captureError(
      createTransport({ connectTimeout: 100 }).connectAndSend(
        parseUrl(`gemini://127.0.0.1:${port}/`),
        undefined,
        new AbortController().signal
      )
    );

    expect(error.kind).toBe(GeminiErrorKind.ConnectTimeout);
    expect(error.message).toBe(`Connection to 127.0.0.1:${port} timed out after 100ms`);
  });

  it('should cancel while connecting', async () => {
    let connected = 0;
    const port = await startPlainServer(() => {
      connected++;
    });
    const controller = new AbortController();

    const pending = captureError(
      createTransport().connectAndSend(parseUrl(`gemini://127.0.0.1:${port}/`), undefined, controller.signal)
    );
    await vi.waitFor(() => expect(connected).toBe(1));
    controller.abort();

    const error = await pending;
    expect(error.kind).toBe(GeminiErrorKind.Cancelled);
  });
});
