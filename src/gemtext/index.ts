/**
 * Gemtext parsing.
 *
 * Lines are classified in order of precedence: link, heading, plain text.
 * Parsed pages are exposed as one-shot generators; re-rendering a page means
 * parsing its lines again.
 */

import {
  GEMINI_SCHEME,
  GemtextElement,
  GemtextHeading,
  GemtextLink,
  HeadingLevel,
  Url,
  formatUrl,
} from '../types';

const LINK_PATTERN = /^=>\s*(\S+)(?:\s+(.*))?$/;
const HEADING_PATTERN = /^#{1,3}/;
const ABSOLUTE_PREFIX = `${GEMINI_SCHEME}://`;

/**
 * Resolves a link target against the page it appears on.
 *
 * Targets with the gemini scheme are already absolute. Anything else is
 * appended to the base URL's string form as-is, without path normalisation.
 */
export function resolveLink(target: string, baseUrl: Url): string {
  if (target.startsWith(ABSOLUTE_PREFIX)) {
    return target;
  }
  return formatUrl(baseUrl) + target;
}

/**
 * Parses a link line, or returns undefined.
 */
export function parseLink(line: string, baseUrl: Url): GemtextLink | undefined {
  const match = LINK_PATTERN.exec(line);
  if (!match || match[1] === undefined) {
    return undefined;
  }

  const target = resolveLink(match[1], baseUrl);
  const label = match[2]?.trim() ?? '';
  return { type: 'link', target, label: label || target };
}

/**
 * Parses a heading line, or returns undefined. The text keeps its hashes.
 */
export function parseHeading(line: string): GemtextHeading | undefined {
  const match = HEADING_PATTERN.exec(line);
  if (!match) {
    return undefined;
  }
  return { type: 'heading', level: headingLevel(match[0].length), text: line };
}

function headingLevel(hashes: number): HeadingLevel {
  if (hashes >= 3) return 3;
  if (hashes === 2) return 2;
  return 1;
}

/**
 * Classifies one gemtext line.
 */
export function parseLine(line: string, baseUrl: Url): GemtextElement {
  return parseLink(line, baseUrl) ?? parseHeading(line) ?? { type: 'text', text: line };
}

/**
 * Lazily parses a sequence of lines.
 */
export function* parseGemtext(lines: Iterable<string>, baseUrl: Url): Generator<GemtextElement> {
  for (const line of lines) {
    yield parseLine(line, baseUrl);
  }
}

/**
 * Lazily parses lines as they arrive.
 */
export async function* parseGemtextStream(
  lines: AsyncIterable<string>,
  baseUrl: Url
): AsyncGenerator<GemtextElement> {
  for await (const line of lines) {
    yield parseLine(line, baseUrl);
  }
}

/**
 * Returns the links of a page, in order.
 */
export function extractLinks(elements: Iterable<GemtextElement>): GemtextLink[] {
  const links: GemtextLink[] = [];
  for (const element of elements) {
    if (element.type === 'link') {
      links.push(element);
    }
  }
  return links;
}
