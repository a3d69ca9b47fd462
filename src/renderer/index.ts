/**
 * Renders success bodies into the presentation sink.
 */

import * as fs from 'fs';
import * as path from 'path';
import { TextDecoder } from 'util';
import { GeminiError } from '../errors';
import { BodyKind, DEFAULT_CHARSET, MediaType, charsetOf, classifyBody, parseMediaType } from '../mime';
import { parseGemtextStream } from '../gemtext';
import { PresentationSink, ResponseBody, Url } from '../types';
import { Logger, createNoopLogger } from '../observability';

/**
 * Writes a downloaded body to disk.
 */
export type FileWriter = (destination: string, data: Buffer) => Promise<void>;

/**
 * Outcome of rendering one body.
 */
export interface RenderResult {
  /** How the body was presented. */
  kind: BodyKind;
  /** Elements (gemtext) or lines (plain text) shown. */
  count: number;
  /** Path a binary body was written to. */
  savedTo?: string;
  /** Bytes written for a binary body. */
  bytesSaved?: number;
}

/**
 * Body renderer options.
 */
export interface BodyRendererOptions {
  /** Writer used for binary bodies; defaults to fs.promises.writeFile. */
  writeFile?: FileWriter;
  /** Logger instance. */
  logger?: Logger;
}

/** Name offered in the save dialog when the URL has no usable file name. */
export const DEFAULT_DOWNLOAD_NAME = 'download';

/**
 * Suggests a file name for a download from its URL path.
 */
export function suggestFileName(url: Url): string {
  const base = path.posix.basename(url.path);
  if (!base) {
    return DEFAULT_DOWNLOAD_NAME;
  }
  try {
    return decodeURIComponent(base);
  } catch {
    return base;
  }
}

/**
 * Renders success bodies.
 */
export class BodyRenderer {
  private readonly writeFile: FileWriter;
  private readonly logger: Logger;

  constructor(options: BodyRendererOptions = {}) {
    this.writeFile = options.writeFile ?? ((destination, data) => fs.promises.writeFile(destination, data));
    this.logger = options.logger ?? createNoopLogger();
  }

  /**
   * Renders a body according to its media type. Text bodies replace the
   * current page; binary bodies are saved where the user chooses.
   */
  async render(
    body: ResponseBody,
    mimetype: string,
    baseUrl: Url,
    sink: PresentationSink
  ): Promise<RenderResult> {
    const mediaType = parseMediaType(mimetype);
    const kind = classifyBody(mediaType);

    switch (kind) {
      case BodyKind.Gemtext:
        return this.renderGemtext(body, mediaType, baseUrl, sink);
      case BodyKind.PlainText:
        return this.renderPlainText(body, mediaType, sink);
      case BodyKind.Binary:
        return this.saveBinary(body, baseUrl, sink);
    }
  }

  private async renderGemtext(
    body: ResponseBody,
    mediaType: MediaType,
    baseUrl: Url,
    sink: PresentationSink
  ): Promise<RenderResult> {
    const lines = this.decodeLines(body, mediaType);
    sink.clear();

    let count = 0;
    for await (const element of parseGemtextStream(lines, baseUrl)) {
      if (count > 0) {
        sink.insertRawText('\n');
      }
      sink.insertElement(element);
      count++;
    }

    return { kind: BodyKind.Gemtext, count };
  }

  private async renderPlainText(
    body: ResponseBody,
    mediaType: MediaType,
    sink: PresentationSink
  ): Promise<RenderResult> {
    const lines: string[] = [];
    for await (const line of this.decodeLines(body, mediaType)) {
      lines.push(line);
    }

    sink.clear();
    sink.insertRawText(lines.join('\n'));
    return { kind: BodyKind.PlainText, count: lines.length };
  }

  private async saveBinary(body: ResponseBody, url: Url, sink: PresentationSink): Promise<RenderResult> {
    const destination = await sink.chooseSaveDestination(suggestFileName(url));
    if (destination === null) {
      throw GeminiError.io('Save cancelled');
    }

    const data = await body.readAll();
    try {
      await this.writeFile(destination, data);
    } catch (err) {
      const cause = err instanceof Error ? err : undefined;
      throw GeminiError.io(`Cannot write ${destination}: ${cause?.message ?? String(err)}`, cause);
    }

    this.logger.info('Saved download', { destination, bytes: data.length });
    return { kind: BodyKind.Binary, count: 0, savedTo: destination, bytesSaved: data.length };
  }

  private async *decodeLines(body: ResponseBody, mediaType: MediaType): AsyncGenerator<string> {
    const decoder = this.createDecoder(charsetOf(mediaType));
    for await (const line of body.lines()) {
      yield decoder.decode(line);
    }
  }

  private createDecoder(charset: string): TextDecoder {
    try {
      return new TextDecoder(charset);
    } catch (err) {
      if (!(err instanceof RangeError)) {
        throw err;
      }
      this.logger.warn('Unsupported charset, decoding as UTF-8', { charset });
      return new TextDecoder(DEFAULT_CHARSET);
    }
  }
}
