/**
 * Gemini protocol implementation: request framing and status lines.
 */

import { GeminiError } from '../errors';
import { Url, formatUrl, withQuery } from '../types';

/** Line terminator for requests and status lines. */
export const CRLF = '\r\n';

/** Longest status line accepted: two digits, a space, 1024 bytes of meta, CRLF. */
export const MAX_STATUS_LINE_LENGTH = 1029;

/** Longest request URL a server is required to accept. */
export const MAX_REQUEST_URL_LENGTH = 1024;

/**
 * Status code groups, keyed by the leading digit.
 */
export enum StatusGroup {
  Input = 'input',
  Success = 'success',
  Redirect = 'redirect',
  TemporaryFailure = 'temporary_failure',
  PermanentFailure = 'permanent_failure',
  Unknown = 'unknown',
}

/**
 * A parsed status line.
 */
export interface StatusLine {
  /** Numeric status code. */
  code: number;
  /** Meta field, verbatim. */
  meta: string;
}

/**
 * Maps a status code onto its group. Codes outside 10-69 and the
 * unassigned 6x range are Unknown.
 */
export function statusGroup(code: number): StatusGroup {
  if (!Number.isInteger(code) || code < 10 || code > 69) {
    return StatusGroup.Unknown;
  }

  switch (Math.floor(code / 10)) {
    case 1:
      return StatusGroup.Input;
    case 2:
      return StatusGroup.Success;
    case 3:
      return StatusGroup.Redirect;
    case 4:
      return StatusGroup.TemporaryFailure;
    case 5:
      return StatusGroup.PermanentFailure;
    default:
      return StatusGroup.Unknown;
  }
}

/**
 * Parses a status line into code and meta.
 *
 * The line is split at its first whitespace character; the code must be all
 * digits and the meta must be non-empty.
 */
export function parseStatus(line: string): StatusLine {
  const trimmed = line.replace(/\r?\n?$/, '');
  const split = trimmed.search(/\s/);
  if (split === -1) {
    throw GeminiError.malformedHeader(trimmed);
  }

  const codeToken = trimmed.substring(0, split);
  const meta = trimmed.substring(split + 1);

  if (!/^\d+$/.test(codeToken) || meta.length === 0) {
    throw GeminiError.malformedHeader(trimmed);
  }

  return { code: parseInt(codeToken, 10), meta };
}

/**
 * Returns true for statuses whose source URL is never recorded in history.
 */
export function isRedirectStatus(code: number): boolean {
  return code >= 30 && code <= 39;
}

/**
 * Returns true when the input prompt should hide what is typed.
 */
export function isSensitiveInput(code: number): boolean {
  return code === 11;
}

/**
 * Formats the request line for a Url, with an optional query replacing the
 * Url's own.
 */
export function formatRequestLine(url: Url, query?: string): string {
  const target = formatUrl(query === undefined ? url : withQuery(url, query));
  if (Buffer.byteLength(target, 'utf-8') > MAX_REQUEST_URL_LENGTH) {
    throw GeminiError.protocol(`Request URL exceeds ${MAX_REQUEST_URL_LENGTH} bytes`);
  }
  return target + CRLF;
}
