/**
 * Gemini transport layer: TLS connections, request framing and response
 * streams.
 */

import * as net from 'net';
import * as tls from 'tls';
import type { Duplex } from 'stream';
import { GeminiError, GeminiErrorKind } from '../errors';
import { GeminiConfig, TlsVersion } from '../config';
import { MAX_STATUS_LINE_LENGTH, formatRequestLine } from '../protocol';
import { GEMINI_SCHEME, ResponseBody, Url } from '../types';
import { Logger, Timer, TracingHook, createNoopLogger } from '../observability';

const LF = 0x0a;
const CR = 0x0d;

/**
 * Where a connector should connect to.
 */
export interface ConnectTarget {
  host: string;
  port: number;
  /** SNI name; absent for IP literals. */
  servername?: string;
}

/**
 * Opens an encrypted, connected duplex stream to a target.
 */
export type SocketConnector = (target: ConnectTarget, signal: AbortSignal) => Promise<Duplex>;

/**
 * Status line plus the still-open body stream.
 */
export interface TransportResponse {
  statusLine: string;
  body: BodyStream;
}

/**
 * Gemini transport interface.
 */
export interface GeminiTransport {
  /**
   * Connects, writes the request line, half-closes and reads the status line.
   */
  connectAndSend(url: Url, query: string | undefined, signal: AbortSignal): Promise<TransportResponse>;
}

/**
 * Transport options.
 */
export interface TransportOptions {
  /** Socket factory; defaults to a Node TLS connector. */
  connector?: SocketConnector;
  /** Logger instance. */
  logger?: Logger;
  /** Tracing hook notified of connections. */
  tracingHook?: TracingHook;
}

/**
 * Converts a stream chunk to a Buffer.
 */
function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) {
    return chunk;
  }
  if (typeof chunk === 'string') {
    return Buffer.from(chunk, 'utf-8');
  }
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk);
  }
  throw GeminiError.protocol(`Unexpected chunk type: ${typeof chunk}`);
}

function stripCr(line: Buffer): Buffer {
  return line.length > 0 && line[line.length - 1] === CR ? line.subarray(0, line.length - 1) : line;
}

/**
 * Accumulates bytes until the status line terminator arrives.
 */
export class StatusLineReader {
  private buffer: Buffer = Buffer.alloc(0);
  private rest: Buffer = Buffer.alloc(0);

  /**
   * Adds data; returns the status line once complete.
   */
  push(chunk: Buffer): string | undefined {
    this.buffer = this.buffer.length > 0 ? Buffer.concat([this.buffer, chunk]) : chunk;

    const lf = this.buffer.indexOf(LF);
    if (lf === -1) {
      if (this.buffer.length >= MAX_STATUS_LINE_LENGTH) {
        throw GeminiError.protocol(`Status line exceeds ${MAX_STATUS_LINE_LENGTH} bytes`);
      }
      return undefined;
    }
    if (lf + 1 > MAX_STATUS_LINE_LENGTH) {
      throw GeminiError.protocol(`Status line exceeds ${MAX_STATUS_LINE_LENGTH} bytes`);
    }

    const line = stripCr(this.buffer.subarray(0, lf)).toString('utf-8');
    this.rest = this.buffer.subarray(lf + 1);
    this.buffer = Buffer.alloc(0);
    return line;
  }

  /**
   * Bytes received after the status line.
   */
  remainder(): Buffer {
    return this.rest;
  }
}

/**
 * Splits a byte stream into LF-terminated lines.
 */
export class LineSplitter {
  private pending: Buffer = Buffer.alloc(0);

  /**
   * Adds data and returns every line it completes.
   */
  push(chunk: Buffer): Buffer[] {
    const data = this.pending.length > 0 ? Buffer.concat([this.pending, chunk]) : chunk;
    const lines: Buffer[] = [];

    let start = 0;
    let lf = data.indexOf(LF, start);
    while (lf !== -1) {
      lines.push(stripCr(data.subarray(start, lf)));
      start = lf + 1;
      lf = data.indexOf(LF, start);
    }

    this.pending = Buffer.from(data.subarray(start));
    return lines;
  }

  /**
   * Returns the unterminated last line, if any.
   */
  flush(): Buffer[] {
    if (this.pending.length === 0) {
      return [];
    }
    const last = stripCr(this.pending);
    this.pending = Buffer.alloc(0);
    return [last];
  }
}

/**
 * Response body backed by the connection.
 */
export class BodyStream implements ResponseBody {
  private readonly socket: Duplex;

  constructor(socket: Duplex) {
    this.socket = socket;
  }

  get closed(): boolean {
    return this.socket.destroyed;
  }

  async *chunks(): AsyncGenerator<Buffer> {
    for await (const chunk of this.socket) {
      yield toBuffer(chunk);
    }
  }

  async *lines(): AsyncGenerator<Buffer> {
    const splitter = new LineSplitter();
    for await (const chunk of this.chunks()) {
      yield* splitter.push(chunk);
    }
    yield* splitter.flush();
  }

  async readAll(): Promise<Buffer> {
    const parts: Buffer[] = [];
    for await (const chunk of this.chunks()) {
      parts.push(chunk);
    }
    return Buffer.concat(parts);
  }

  close(): void {
    if (!this.socket.destroyed) {
      this.socket.destroy();
    }
  }
}

/**
 * Reads the status line from a socket, leaving any following bytes unread.
 */
export function readStatusLine(socket: Duplex, timeoutMs: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const reader = new StatusLineReader();
    let timer: NodeJS.Timeout | undefined;

    const cleanup = (): void => {
      if (timer) {
        clearTimeout(timer);
      }
      socket.removeListener('data', onData);
      socket.removeListener('end', onClose);
      socket.removeListener('close', onClose);
      socket.removeListener('error', onError);
    };

    const onData = (chunk: unknown): void => {
      let line: string | undefined;
      try {
        line = reader.push(toBuffer(chunk));
      } catch (err) {
        cleanup();
        reject(err);
        return;
      }
      if (line === undefined) {
        return;
      }

      cleanup();
      socket.pause();
      const rest = reader.remainder();
      if (rest.length > 0) {
        socket.unshift(rest);
      }
      resolve(line);
    };

    const onClose = (): void => {
      cleanup();
      reject(GeminiError.protocol('Connection closed before a status line was received'));
    };

    const onError = (err: Error): void => {
      cleanup();
      reject(GeminiError.connection(err.message, err));
    };

    if (timeoutMs > 0) {
      timer = setTimeout(() => {
        cleanup();
        reject(
          GeminiError.timeout(GeminiErrorKind.ReadTimeout, `No status line after ${timeoutMs}ms`)
        );
      }, timeoutMs);
    }

    socket.on('data', onData);
    socket.once('end', onClose);
    socket.once('close', onClose);
    socket.once('error', onError);
  });
}

const DNS_ERROR_CODES = ['ENOTFOUND', 'EAI_AGAIN', 'EAI_FAIL'];

/**
 * Maps a socket error raised while connecting onto a GeminiError.
 */
export function classifyConnectError(err: Error, target: ConnectTarget): GeminiError {
  const code = 'code' in err && typeof err.code === 'string' ? err.code : '';
  const where = `${target.host}:${target.port}`;

  if (DNS_ERROR_CODES.includes(code)) {
    return GeminiError.connection(`Cannot resolve host ${target.host}`, err);
  }
  if (
    code.startsWith('ERR_SSL') ||
    code.startsWith('ERR_TLS') ||
    code.includes('CERT') ||
    /ssl|tls|handshake/i.test(err.message)
  ) {
    return GeminiError.tls(`TLS handshake with ${where} failed: ${err.message}`, err);
  }
  return GeminiError.connection(`Cannot connect to ${where}: ${err.message}`, err);
}

function secureVersion(version: TlsVersion): tls.SecureVersion {
  switch (version) {
    case TlsVersion.Tls12:
      return 'TLSv1.2';
    case TlsVersion.Tls13:
      return 'TLSv1.3';
  }
}

/**
 * Creates a connector that opens TLS sockets with Node's tls module.
 */
export function createTlsConnector(config: GeminiConfig): SocketConnector {
  return (target, signal) =>
    new Promise<Duplex>((resolve, reject) => {
      if (signal.aborted) {
        reject(GeminiError.cancelled());
        return;
      }

      const options: tls.ConnectionOptions = {
        host: target.host,
        port: target.port,
        servername: config.tls.sniOverride ?? target.servername,
        minVersion: secureVersion(config.tls.minVersion),
        rejectUnauthorized: config.tls.verifyCertificate,
      };
      const socket = tls.connect(options);
      let timer: NodeJS.Timeout | undefined;

      const cleanup = (): void => {
        if (timer) {
          clearTimeout(timer);
        }
        signal.removeEventListener('abort', onAbort);
        socket.removeListener('secureConnect', onConnect);
        socket.removeListener('error', onError);
      };

      const onConnect = (): void => {
        cleanup();
        resolve(socket);
      };

      const onError = (err: Error): void => {
        cleanup();
        socket.destroy();
        reject(classifyConnectError(err, target));
      };

      const onAbort = (): void => {
        cleanup();
        socket.destroy();
        reject(GeminiError.cancelled());
      };

      if (config.connectTimeout > 0) {
        timer = setTimeout(() => {
          cleanup();
          socket.destroy();
          reject(
            GeminiError.timeout(
              GeminiErrorKind.ConnectTimeout,
              `Connection to ${target.host}:${target.port} timed out after ${config.connectTimeout}ms`
            )
          );
        }, config.connectTimeout);
      }

      socket.once('secureConnect', onConnect);
      socket.once('error', onError);
      signal.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * TLS transport implementation.
 */
export class TlsTransport implements GeminiTransport {
  private readonly config: GeminiConfig;
  private readonly connector: SocketConnector;
  private readonly logger: Logger;
  private readonly tracingHook?: TracingHook;

  constructor(config: GeminiConfig, options: TransportOptions = {}) {
    this.config = config;
    this.connector = options.connector ?? createTlsConnector(config);
    this.logger = options.logger ?? createNoopLogger();
    this.tracingHook = options.tracingHook;
  }

  async connectAndSend(
    url: Url,
    query: string | undefined,
    signal: AbortSignal
  ): Promise<TransportResponse> {
    if (url.scheme !== GEMINI_SCHEME) {
      throw new GeminiError(GeminiErrorKind.UnsupportedScheme, `Unsupported scheme: ${url.scheme}`);
    }
    if (signal.aborted) {
      throw GeminiError.cancelled();
    }

    const requestLine = formatRequestLine(url, query);
    const host = url.host.replace(/^\[(.*)\]$/, '$1');
    const target: ConnectTarget = {
      host,
      port: url.port,
      servername: net.isIP(host) === 0 ? host : undefined,
    };

    const timer = Timer.start();
    const socket = await this.connector(target, signal);

    // Late errors surface through the body iterator; this keeps them from
    // going unhandled between reads.
    socket.on('error', (err: Error) => {
      this.logger.debug('Socket error', { host, error: err.message });
    });

    const onAbort = (): void => {
      socket.destroy();
    };
    signal.addEventListener('abort', onAbort, { once: true });
    socket.once('close', () => signal.removeEventListener('abort', onAbort));

    // Until the body is handed over, the socket belongs to this call.
    try {
      this.tracingHook?.onConnect?.(host, url.port, timer.elapsed());
      this.logger.debug('Connected', { host, port: url.port, durationMs: timer.elapsed() });

      if (signal.aborted) {
        throw GeminiError.cancelled();
      }
      socket.end(requestLine);

      const statusLine = await readStatusLine(socket, this.config.readTimeout);
      this.logger.debug('Status line received', { statusLine });
      return { statusLine, body: new BodyStream(socket) };
    } catch (err) {
      socket.destroy();
      if (signal.aborted) {
        throw GeminiError.cancelled();
      }
      throw err;
    }
  }
}

/**
 * Creates a transport from configuration.
 */
export function createTransport(config: GeminiConfig, options?: TransportOptions): GeminiTransport {
  return new TlsTransport(config, options);
}
