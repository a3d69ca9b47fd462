import { describe, it, expect, vi } from 'vitest';
import { LineSplitter, StatusLineReader, TlsTransport } from '../index';
import { GeminiError, GeminiErrorKind, isGeminiError } from '../../errors';
import { createGeminiConfig } from '../../config';
import { parseUrl } from '../../types';
import { MockGeminiServer } from '../../mocks';

function createTransport(server: MockGeminiServer, readTimeout = 1000): TlsTransport {
  return new TlsTransport(createGeminiConfig({ readTimeout }), { connector: server.connector });
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

describe('StatusLineReader', () => {
  it('should return the line and keep the rest', () => {
    const reader = new StatusLineReader();

    expect(reader.push(Buffer.from('20 text/gemini\r\n# Hi'))).toBe('20 text/gemini');
    expect(reader.remainder().toString()).toBe('# Hi');
  });

  it('should wait for the terminator across chunks', () => {
    const reader = new StatusLineReader();

    expect(reader.push(Buffer.from('51 Not'))).toBeUndefined();
    expect(reader.push(Buffer.from(' found\r\n'))).toBe('51 Not found');
    expect(reader.remainder().length).toBe(0);
  });

  it('should accept a bare LF', () => {
    expect(new StatusLineReader().push(Buffer.from('20 text/plain\n'))).toBe('20 text/plain');
  });

  it('should reject an overlong status line', () => {
    const reader = new StatusLineReader();

    expect(() => reader.push(Buffer.alloc(1029, 0x61))).toThrow('Status line exceeds 1029 bytes');
  });
});

describe('LineSplitter', () => {
  it('should split lines and strip carriage returns', () => {
    const splitter = new LineSplitter();

    expect(splitter.push(Buffer.from('a\r\nb')).map(String)).toEqual(['a']);
    expect(splitter.push(Buffer.from('\nc')).map(String)).toEqual(['b']);
    expect(splitter.flush().map(String)).toEqual(['c']);
    expect(splitter.flush()).toEqual([]);
  });

  it('should keep empty lines', () => {
    expect(new LineSplitter().push(Buffer.from('\r\n\n')).map(String)).toEqual(['', '']);
  });
});

describe('TlsTransport', () => {
  it('should send the request line, half-close and read the status line', async () => {
    const server = new MockGeminiServer().route('gemini://h/page', {
      status: 20,
      meta: 'text/gemini',
      body: '# Hi\r\n',
    });

    const response = await createTransport(server).connectAndSend(
      parseUrl('gemini://h/page'),
      undefined,
      new AbortController().signal
    );

    expect(response.statusLine).toBe('20 text/gemini');
    expect((await response.body.readAll()).toString()).toBe('# Hi\r\n');
    expect(server.sockets[0]?.requestData).toBe('gemini://h/page\r\n');
    expect(server.sockets[0]?.halfClosed).toBe(true);
    expect(server.connections).toEqual([{ host: 'h', port: 1965, servername: 'h' }]);
  });

  it('should replace the query', async () => {
    const server = new MockGeminiServer();

    await createTransport(server).connectAndSend(
      parseUrl('gemini://h/search?old'),
      'new%20words',
      new AbortController().signal
    );

    expect(server.requests).toEqual(['gemini://h/search?new%20words']);
  });

  it('should stream body lines', async () => {
    const server = new MockGeminiServer().route('gemini://h/', {
      status: 20,
      meta: 'text/gemini',
      body: '# Hi\r\n=> /x there\r\nlast',
    });

    const { body } = await createTransport(server).connectAndSend(
      parseUrl('gemini://h/'),
      undefined,
      new AbortController().signal
    );
    const lines: string[] = [];
    for await (const line of body.lines()) {
      lines.push(line.toString());
    }

    expect(lines).toEqual(['# Hi', '=> /x there', 'last']);
  });

  it('should omit SNI for IP literals', async () => {
    const server = new MockGeminiServer();

    await createTransport(server).connectAndSend(
      parseUrl('gemini://[::1]:1966/'),
      undefined,
      new AbortController().signal
    );

    expect(server.connections).toEqual([{ host: '::1', port: 1966, servername: undefined }]);
  });

  it('should report connections to tracing hooks', async () => {
    const server = new MockGeminiServer();
    const onConnect = vi.fn();
    const transport = new TlsTransport(createGeminiConfig(), {
      connector: server.connector,
      tracingHook: { onConnect },
    });

    await transport.connectAndSend(parseUrl('gemini://h/'), undefined, new AbortController().signal);

    expect(onConnect).toHaveBeenCalledWith('h', 1965, expect.any(Number));
  });

  it('should close the socket when a connect hook throws', async () => {
    const server = new MockGeminiServer();
    const transport = new TlsTransport(createGeminiConfig(), {
      connector: server.connector,
      tracingHook: {
        onConnect: () => {
          throw new Error('hook failed');
        },
      },
    });

    await expect(
      transport.connectAndSend(parseUrl('gemini://h/'), undefined, new AbortController().signal)
    ).rejects.toThrow('hook failed');
    expect(server.lastSocket()?.destroyed).toBe(true);
    expect(server.lastSocket()?.halfClosed).toBe(false);
    expect(server.requests).toEqual([]);
  });

  it('should reject other schemes', async () => {
    const error = await captureError(
      createTransport(new MockGeminiServer()).connectAndSend(
        parseUrl('https://h/'),
        undefined,
        new AbortController().signal
      )
    );

    expect(error.kind).toBe(GeminiErrorKind.UnsupportedScheme);
    expect(error.message).toBe('Unsupported scheme: https');
  });

  it('should fail when the connection closes before the status line', async () => {
    const server = new MockGeminiServer().route('gemini://h/', { raw: '20 text/gem' });

    const error = await captureError(
      createTransport(server).connectAndSend(parseUrl('gemini://h/'), undefined, new AbortController().signal)
    );

    expect(error.kind).toBe(GeminiErrorKind.ProtocolViolation);
    expect(error.message).toBe('Connection closed before a status line was received');
  });

  it('should time out waiting for the status line', async () => {
    const server = new MockGeminiServer().route('gemini://h/', { raw: '', keepOpen: true });

    const error = await captureError(
      createTransport(server, 50).connectAndSend(parseUrl('gemini://h/'), undefined, new AbortController().signal)
    );

    expect(error.kind).toBe(GeminiErrorKind.ReadTimeout);
    expect(error.message).toBe('No status line after 50ms');
    expect(server.sockets[0]?.destroyed).toBe(true);
  });

  it('should map refused connections', async () => {
    const server = new MockGeminiServer().failConnect(
      'down.example',
      Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' })
    );

    const error = await captureError(
      createTransport(server).connectAndSend(
        parseUrl('gemini://down.example/'),
        undefined,
        new AbortController().signal
      )
    );

    expect(error.kind).toBe(GeminiErrorKind.ConnectionFailed);
    expect(error.message).toBe('Cannot connect to down.example:1965: connect ECONNREFUSED');
  });

  it('should map unresolvable hosts', async () => {
    const server = new MockGeminiServer().failConnect(
      'nowhere.example',
      Object.assign(new Error('getaddrinfo ENOTFOUND nowhere.example'), { code: 'ENOTFOUND' })
    );

    const error = await captureError(
      createTransport(server).connectAndSend(
        parseUrl('gemini://nowhere.example/'),
        undefined,
        new AbortController().signal
      )
    );

    expect(error.message).toBe('Cannot resolve host nowhere.example');
  });

  it('should not connect once aborted', async () => {
    const server = new MockGeminiServer();
    const controller = new AbortController();
    controller.abort();

    const error = await captureError(
      createTransport(server).connectAndSend(parseUrl('gemini://h/'), undefined, controller.signal)
    );

    expect(error.kind).toBe(GeminiErrorKind.Cancelled);
    expect(server.connections).toEqual([]);
  });

  it('should destroy the socket when aborted while waiting for the status line', async () => {
    const server = new MockGeminiServer().route('gemini://h/', { raw: '', keepOpen: true });
    const controller = new AbortController();

    const pending = captureError(
      createTransport(server).connectAndSend(parseUrl('gemini://h/'), undefined, controller.signal)
    );
    await vi.waitFor(() => expect(server.sockets[0]?.halfClosed).toBe(true));
    controller.abort();

    const error = await pending;
    expect(error.kind).toBe(GeminiErrorKind.Cancelled);
    expect(server.sockets[0]?.destroyed).toBe(true);
  });

  it('should close the body on demand', async () => {
    const server = new MockGeminiServer().route('gemini://h/', {
      status: 20,
      meta: 'text/plain',
      body: 'partial',
      keepOpen: true,
    });

    const { body } = await createTransport(server).connectAndSend(
      parseUrl('gemini://h/'),
      undefined,
      new AbortController().signal
    );
    expect(body.closed).toBe(false);

    body.close();
    expect(body.closed).toBe(true);
  });
});
