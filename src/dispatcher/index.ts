/**
 * Response dispatch: decides what a status line means for the session.
 */

import { GeminiError } from '../errors';
import { GeminiConfig, HistoryPolicy } from '../config';
import { NavigationHistory } from '../history';
import { RequestScope } from '../lifecycle';
import { StatusGroup, isRedirectStatus, isSensitiveInput, statusGroup } from '../protocol';
import { BodyRenderer } from '../renderer';
import { GeminiResponse, PresentationSink, Url, formatUrl, parseUrl, urlsEqual, withQuery } from '../types';
import { Logger, MetricsCollector, createNoopLogger } from '../observability';

/**
 * Fetches a follow-up request in the same scope.
 */
export type FollowUp = (url: Url, query: string | undefined, redirects: number) => Promise<void>;

/**
 * Per-request state handed to the dispatcher.
 */
export interface DispatchContext {
  /** Scope of the request. */
  scope: RequestScope;
  /** Sink bound to the scope. */
  sink: PresentationSink;
  /** Redirects followed so far. */
  redirects: number;
  /** Whether the navigation came from Back. */
  fromHistory: boolean;
  /** Issues the next request of a redirect or input chain. */
  follow: FollowUp;
}

/**
 * What the dispatcher did with a response.
 */
export enum DispatchOutcome {
  Rendered = 'rendered',
  Redirected = 'redirected',
  InputSubmitted = 'input_submitted',
  InputCancelled = 'input_cancelled',
}

/**
 * Dispatcher dependencies.
 */
export interface ResponseDispatcherOptions {
  config: GeminiConfig;
  history: NavigationHistory;
  renderer: BodyRenderer;
  logger?: Logger;
  metrics?: MetricsCollector;
}

/** Prompt titles, keyed by whether the input is sensitive. */
const INPUT_TITLE = 'Input requested';
const SENSITIVE_INPUT_TITLE = 'Sensitive input requested';

/**
 * Routes a response by its status group.
 */
export class ResponseDispatcher {
  private readonly config: GeminiConfig;
  private readonly history: NavigationHistory;
  private readonly renderer: BodyRenderer;
  private readonly logger: Logger;
  private readonly metrics?: MetricsCollector;

  constructor(options: ResponseDispatcherOptions) {
    this.config = options.config;
    this.history = options.history;
    this.renderer = options.renderer;
    this.logger = options.logger ?? createNoopLogger();
    this.metrics = options.metrics;
  }

  /**
   * Handles one response. Failure statuses are thrown as GeminiErrors after
   * history has been updated.
   */
  async dispatch(response: GeminiResponse, context: DispatchContext): Promise<DispatchOutcome> {
    const group = statusGroup(response.status);
    this.metrics?.recordResponse(group);

    // Only success bodies are read; the rest must not hold the connection
    // open across a follow-up request.
    if (group !== StatusGroup.Success) {
      response.body.close();
    }

    switch (group) {
      case StatusGroup.Input:
        return this.handleInput(response, context);

      case StatusGroup.Success:
        return this.handleSuccess(response, context);

      case StatusGroup.Redirect:
        return this.handleRedirect(response, context);

      case StatusGroup.TemporaryFailure:
      case StatusGroup.PermanentFailure:
        this.recordHistory(response, context, false);
        throw GeminiError.fromStatus(response.status, response.meta);

      case StatusGroup.Unknown:
        throw GeminiError.fromStatus(response.status, response.meta);
    }
  }

  private async handleInput(response: GeminiResponse, context: DispatchContext): Promise<DispatchOutcome> {
    this.recordHistory(response, context, false);
    this.metrics?.recordInputPrompt();

    const title = isSensitiveInput(response.status) ? SENSITIVE_INPUT_TITLE : INPUT_TITLE;
    const input = await context.sink.promptUser(title, response.meta);
    if (input === null) {
      this.logger.debug('Input prompt dismissed', { url: formatUrl(response.sourceUrl) });
      return DispatchOutcome.InputCancelled;
    }
    context.scope.throwIfCancelled();

    await context.follow(
      withQuery(response.sourceUrl, undefined),
      encodeURIComponent(input),
      context.redirects
    );
    return DispatchOutcome.InputSubmitted;
  }

  private async handleSuccess(response: GeminiResponse, context: DispatchContext): Promise<DispatchOutcome> {
    let rendered = false;
    try {
      const result = await this.renderer.render(
        response.body,
        response.meta,
        response.sourceUrl,
        context.sink
      );
      if (result.bytesSaved !== undefined) {
        this.metrics?.recordBytesSaved(result.bytesSaved);
      }
      rendered = true;
    } finally {
      this.recordHistory(response, context, rendered);
    }
    return DispatchOutcome.Rendered;
  }

  private async handleRedirect(response: GeminiResponse, context: DispatchContext): Promise<DispatchOutcome> {
    if (context.redirects >= this.config.maxRedirects) {
      throw GeminiError.tooManyRedirects(this.config.maxRedirects);
    }

    const target = parseUrl(response.meta);
    this.metrics?.recordRedirect();
    this.logger.info('Following redirect', {
      from: formatUrl(response.sourceUrl),
      to: formatUrl(target),
      status: response.status,
    });

    await context.follow(target, undefined, context.redirects + 1);
    return DispatchOutcome.Redirected;
  }

  /**
   * Pushes the response's URL under the configured policy. Redirecting
   * URLs are never pushed, nor is anything once the scope has ended.
   */
  private recordHistory(response: GeminiResponse, context: DispatchContext, rendered: boolean): void {
    if (!context.scope.isActive || isRedirectStatus(response.status)) {
      return;
    }
    if (this.config.historyPolicy === HistoryPolicy.RenderedOnly && !rendered) {
      return;
    }
    if (context.fromHistory && urlsEqual(this.history.current(), response.sourceUrl)) {
      return;
    }
    this.history.push(response.sourceUrl);
  }
}
