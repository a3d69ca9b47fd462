/**
 * Core types for the Gemini client.
 */

import { GeminiError } from '../errors';
import { DEFAULT_PORT } from '../config';

/** The protocol's own URL scheme. */
export const GEMINI_SCHEME = 'gemini';

/**
 * An absolute Gemini URL.
 */
export interface Url {
  /** Scheme without the trailing colon (e.g., "gemini"). */
  scheme: string;
  /** Host name or bracketed IPv6 literal. */
  host: string;
  /** Port (1965 when absent from the input). */
  port: number;
  /** Path, possibly empty. */
  path: string;
  /** Query string without the leading "?". */
  query?: string;
}

const SCHEME_PREFIX = /^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//;

/**
 * Parses user input or a link target into an absolute Url.
 * Input without a scheme is taken to be a Gemini URL.
 */
export function parseUrl(input: string): Url {
  const trimmed = input.trim();
  if (!trimmed) {
    throw GeminiError.invalidUrl(input);
  }

  const candidate = SCHEME_PREFIX.test(trimmed) ? trimmed : `${GEMINI_SCHEME}://${trimmed}`;

  let parsed: URL;
  try {
    parsed = new URL(candidate);
  } catch (err) {
    throw GeminiError.invalidUrl(input, err instanceof Error ? err : undefined);
  }

  if (!parsed.hostname) {
    throw GeminiError.invalidUrl(input);
  }

  const url: Url = {
    scheme: parsed.protocol.slice(0, -1).toLowerCase(),
    host: parsed.hostname,
    port: parsed.port ? Number(parsed.port) : DEFAULT_PORT,
    path: parsed.pathname,
  };
  if (parsed.search.length > 1) {
    url.query = parsed.search.slice(1);
  }
  return url;
}

/**
 * Formats a Url in its canonical string form. The port is omitted when it
 * is the default.
 */
export function formatUrl(url: Url): string {
  const port = url.port === DEFAULT_PORT ? '' : `:${url.port}`;
  const query = url.query !== undefined ? `?${url.query}` : '';
  return `${url.scheme}://${url.host}${port}${url.path}${query}`;
}

/**
 * Returns a copy of the Url with the given query (or none).
 */
export function withQuery(url: Url, query: string | undefined): Url {
  const next: Url = { scheme: url.scheme, host: url.host, port: url.port, path: url.path };
  if (query !== undefined) {
    next.query = query;
  }
  return next;
}

/**
 * Compares two Urls by their string form.
 */
export function urlsEqual(a: Url | undefined, b: Url | undefined): boolean {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  return formatUrl(a) === formatUrl(b);
}

/**
 * Heading depth.
 */
export type HeadingLevel = 1 | 2 | 3;

/**
 * A link line. The target is absolute.
 */
export interface GemtextLink {
  type: 'link';
  target: string;
  label: string;
}

/**
 * A heading line. The text keeps its leading hashes.
 */
export interface GemtextHeading {
  type: 'heading';
  level: HeadingLevel;
  text: string;
}

/**
 * Any other line.
 */
export interface GemtextText {
  type: 'text';
  text: string;
}

/**
 * A rendered gemtext line.
 */
export type GemtextElement = GemtextLink | GemtextHeading | GemtextText;

/**
 * Readable response body. Closing it releases the connection.
 */
export interface ResponseBody {
  /** Raw byte chunks. */
  chunks(): AsyncIterable<Buffer>;
  /** Lines split on LF with a trailing CR removed. */
  lines(): AsyncIterable<Buffer>;
  /** Reads the remaining body into one buffer. */
  readAll(): Promise<Buffer>;
  /** Closes the underlying connection. */
  close(): void;
  /** Whether the connection has been closed. */
  readonly closed: boolean;
}

/**
 * A parsed response, owned by the dispatcher for one dispatch.
 */
export interface GeminiResponse {
  /** Two-digit status code. */
  status: number;
  /** Meta field of the status line. */
  meta: string;
  /** Body stream (only read for success statuses). */
  body: ResponseBody;
  /** Url that produced this response (query included). */
  sourceUrl: Url;
}

/**
 * Presentation layer consumed by the client.
 */
export interface PresentationSink {
  /** Removes the current page. */
  clear(): void;
  /** Appends a gemtext element. */
  insertElement(element: GemtextElement): void;
  /** Appends unstyled text. */
  insertRawText(text: string): void;
  /** Updates the address field. */
  setAddress(address: string): void;
  /** Updates the status label. */
  setStatusMessage(message: string): void;
  /** Asks for one line of input; resolves to null when cancelled. */
  promptUser(title: string, message: string): Promise<string | null>;
  /** Asks where to save a download; resolves to null when cancelled. */
  chooseSaveDestination(suggestedName?: string): Promise<string | null>;
  /** Reports an error. */
  showErrorDialog(message: string): void;
}

/**
 * Events supplied by the input source.
 */
export interface InputHandlers {
  onGo(url: string): void;
  onBack(): void;
}
