/**
 * Mock implementations for testing.
 */

import { Duplex } from 'stream';
import { GeminiError } from '../errors';
import { CRLF } from '../protocol';
import { ConnectTarget, SocketConnector, classifyConnectError } from '../transport';
import { FileWriter } from '../renderer';
import { GemtextElement, PresentationSink } from '../types';

/**
 * In-memory duplex standing in for a TLS socket.
 */
export class MockSocket extends Duplex {
  private readonly received: Buffer[] = [];
  private readonly onRequest: (socket: MockSocket) => void;
  private halfClosedFlag = false;

  constructor(onRequest: (socket: MockSocket) => void = () => undefined) {
    super();
    this.onRequest = onRequest;
  }

  /** Whether the client has half-closed its side. */
  get halfClosed(): boolean {
    return this.halfClosedFlag;
  }

  /** Everything the client wrote. */
  get requestData(): string {
    return Buffer.concat(this.received).toString('utf-8');
  }

  /** The request line without its terminator. */
  get requestLine(): string {
    return this.requestData.replace(/\r\n$/, '');
  }

  /**
   * Sends data to the client. Ignored once the socket is destroyed.
   */
  respond(data: string | Buffer): boolean {
    if (this.destroyed) {
      return false;
    }
    return this.push(typeof data === 'string' ? Buffer.from(data, 'utf-8') : data);
  }

  /** Closes the server side. */
  finish(): void {
    if (!this.destroyed) {
      this.push(null);
    }
  }

  override _read(): void {
    // Data is pushed by respond().
  }

  override _write(
    chunk: unknown,
    encoding: BufferEncoding,
    callback: (error?: Error | null) => void
  ): void {
    if (Buffer.isBuffer(chunk)) {
      this.received.push(chunk);
    } else if (typeof chunk === 'string') {
      this.received.push(Buffer.from(chunk, encoding));
    }
    callback();
  }

  override _final(callback: (error?: Error | null) => void): void {
    this.halfClosedFlag = true;
    callback();
    this.onRequest(this);
  }
}

/**
 * Scripted reply for one request line.
 */
export type MockReply =
  | {
      status: number;
      meta: string;
      body?: string | Buffer;
      /** Leave the connection open after the body. */
      keepOpen?: boolean;
    }
  | {
      /** Bytes sent verbatim. */
      raw: string | Buffer;
      keepOpen?: boolean;
    };

/**
 * In-process Gemini server reached through its connector.
 */
export class MockGeminiServer {
  private readonly routes = new Map<string, MockReply>();
  private readonly connectErrors = new Map<string, Error>();
  /** Request lines received, without terminators. */
  readonly requests: string[] = [];
  /** Targets connected to. */
  readonly connections: ConnectTarget[] = [];
  /** Sockets handed out, in order. */
  readonly sockets: MockSocket[] = [];

  /**
   * Socket factory to pass to the client or transport.
   */
  readonly connector: SocketConnector = async (target, signal) => {
    if (signal.aborted) {
      throw GeminiError.cancelled();
    }
    this.connections.push({ ...target });

    const error = this.connectErrors.get(target.host);
    if (error) {
      throw classifyConnectError(error, target);
    }

    const socket = new MockSocket((s) => this.handle(s));
    this.sockets.push(socket);
    return socket;
  };

  /** Scripts the reply to a request line. */
  route(requestLine: string, reply: MockReply): this {
    this.routes.set(requestLine, reply);
    return this;
  }

  /** Makes connections to a host fail. */
  failConnect(host: string, error: Error): this {
    this.connectErrors.set(host, error);
    return this;
  }

  /** The most recent socket. */
  lastSocket(): MockSocket | undefined {
    return this.sockets[this.sockets.length - 1];
  }

  private handle(socket: MockSocket): void {
    const line = socket.requestLine;
    this.requests.push(line);

    const reply = this.routes.get(line) ?? { status: 51, meta: 'Not found' };
    if ('raw' in reply) {
      socket.respond(reply.raw);
    } else {
      socket.respond(`${reply.status} ${reply.meta}${CRLF}`);
      if (reply.body !== undefined) {
        socket.respond(reply.body);
      }
    }
    if (!reply.keepOpen) {
      socket.finish();
    }
  }
}

/**
 * Everything a presentation sink was asked to do.
 */
export type SinkEvent =
  | { type: 'clear' }
  | { type: 'element'; element: GemtextElement }
  | { type: 'text'; text: string }
  | { type: 'address'; address: string }
  | { type: 'status'; message: string }
  | { type: 'prompt'; title: string; message: string }
  | { type: 'save'; suggestedName?: string }
  | { type: 'error'; message: string };

/**
 * Presentation sink that records calls and answers dialogs from a script.
 * Unscripted prompts and save dialogs are dismissed.
 */
export class RecordingSink implements PresentationSink {
  readonly events: SinkEvent[] = [];
  private readonly promptReplies: Array<string | null> = [];
  private readonly saveReplies: Array<string | null> = [];
  private pendingDialogs = false;

  /** Queues answers for upcoming prompts. */
  replyToPrompts(...replies: Array<string | null>): this {
    this.promptReplies.push(...replies);
    return this;
  }

  /** Queues answers for upcoming save dialogs. */
  replyToSaves(...replies: Array<string | null>): this {
    this.saveReplies.push(...replies);
    return this;
  }

  /** Leaves unscripted dialogs unanswered. */
  holdDialogs(): this {
    this.pendingDialogs = true;
    return this;
  }

  clear(): void {
    this.events.push({ type: 'clear' });
  }

  insertElement(element: GemtextElement): void {
    this.events.push({ type: 'element', element });
  }

  insertRawText(text: string): void {
    this.events.push({ type: 'text', text });
  }

  setAddress(address: string): void {
    this.events.push({ type: 'address', address });
  }

  setStatusMessage(message: string): void {
    this.events.push({ type: 'status', message });
  }

  promptUser(title: string, message: string): Promise<string | null> {
    this.events.push({ type: 'prompt', title, message });
    return this.answer(this.promptReplies);
  }

  chooseSaveDestination(suggestedName?: string): Promise<string | null> {
    this.events.push({ type: 'save', suggestedName });
    return this.answer(this.saveReplies);
  }

  showErrorDialog(message: string): void {
    this.events.push({ type: 'error', message });
  }

  /** Page content events: clears, elements and raw text. */
  pageEvents(): SinkEvent[] {
    return this.events.filter((e) => e.type === 'clear' || e.type === 'element' || e.type === 'text');
  }

  /** Messages shown in error dialogs. */
  errors(): string[] {
    const messages: string[] = [];
    for (const event of this.events) {
      if (event.type === 'error') messages.push(event.message);
    }
    return messages;
  }

  /** Status bar messages. */
  statuses(): string[] {
    const messages: string[] = [];
    for (const event of this.events) {
      if (event.type === 'status') messages.push(event.message);
    }
    return messages;
  }

  /** Addresses shown. */
  addresses(): string[] {
    const addresses: string[] = [];
    for (const event of this.events) {
      if (event.type === 'address') addresses.push(event.address);
    }
    return addresses;
  }

  /** Clears recorded events. */
  reset(): void {
    this.events.length = 0;
  }

  private answer(queue: Array<string | null>): Promise<string | null> {
    if (queue.length > 0) {
      return Promise.resolve(queue.shift() ?? null);
    }
    if (this.pendingDialogs) {
      return new Promise<string | null>(() => undefined);
    }
    return Promise.resolve(null);
  }
}

/**
 * File writer that keeps downloads in memory.
 */
export class MemoryFileWriter {
  readonly files = new Map<string, Buffer>();
  private failure?: Error;

  /** Makes every write fail with the error. */
  failWith(error: Error): this {
    this.failure = error;
    return this;
  }

  /** Writer to pass to the renderer or client. */
  readonly write: FileWriter = async (destination, data) => {
    if (this.failure) {
      throw this.failure;
    }
    this.files.set(destination, Buffer.from(data));
  };
}

/**
 * Creates a mock server.
 */
export function createMockServer(): MockGeminiServer {
  return new MockGeminiServer();
}

/**
 * Creates a recording sink.
 */
export function createRecordingSink(): RecordingSink {
  return new RecordingSink();
}
