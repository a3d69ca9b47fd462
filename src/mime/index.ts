/**
 * Media type handling for success responses.
 */

/** Media type of gemtext documents. */
export const GEMTEXT_MIME_TYPE = 'text/gemini';

/** Charset used when a response names none (or an unknown one). */
export const DEFAULT_CHARSET = 'utf-8';

/**
 * A parsed media type.
 */
export interface MediaType {
  /** Top-level type, lowercased (e.g., "text"). */
  type: string;
  /** Subtype, lowercased (e.g., "gemini"). */
  subtype: string;
  /** "type/subtype". */
  essence: string;
  /** Parameters with lowercased names. */
  parameters: Record<string, string>;
}

/**
 * How a body is presented.
 */
export enum BodyKind {
  /** Parsed as gemtext. */
  Gemtext = 'gemtext',
  /** Shown as plain lines. */
  PlainText = 'plain_text',
  /** Saved to a file. */
  Binary = 'binary',
}

/**
 * Parses the meta of a 2x status line as a media type.
 */
export function parseMediaType(meta: string): MediaType {
  const [head = '', ...rawParams] = meta.split(';');
  const essence = head.trim().toLowerCase();
  const slash = essence.indexOf('/');
  const type = slash === -1 ? essence : essence.substring(0, slash);
  const subtype = slash === -1 ? '' : essence.substring(slash + 1);

  const parameters: Record<string, string> = {};
  for (const param of rawParams) {
    const eq = param.indexOf('=');
    if (eq === -1) {
      continue;
    }
    const name = param.substring(0, eq).trim().toLowerCase();
    const value = param
      .substring(eq + 1)
      .trim()
      .replace(/^"(.*)"$/, '$1');
    if (name) {
      parameters[name] = value;
    }
  }

  return { type, subtype, essence, parameters };
}

/**
 * Decides how a body with the given media type is presented.
 */
export function classifyBody(mediaType: MediaType): BodyKind {
  if (mediaType.essence === GEMTEXT_MIME_TYPE) {
    return BodyKind.Gemtext;
  }
  if (mediaType.type === 'text') {
    return BodyKind.PlainText;
  }
  return BodyKind.Binary;
}

/**
 * Returns the charset named by the media type, or the default.
 */
export function charsetOf(mediaType: MediaType): string {
  return mediaType.parameters['charset']?.toLowerCase() || DEFAULT_CHARSET;
}
