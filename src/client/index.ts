/**
 * Gemini client: one browsing session.
 */

import { GeminiError, GeminiErrorKind, toGeminiError } from '../errors';
import {
  GeminiConfig,
  GeminiConfigBuilder,
  GeminiConfigOptions,
  HistoryPolicy,
  TlsConfig,
  createGeminiConfig,
} from '../config';
import {
  GemtextLink,
  InputHandlers,
  PresentationSink,
  Url,
  formatUrl,
  parseUrl,
  withQuery,
} from '../types';
import { parseStatus } from '../protocol';
import { GeminiTransport, SocketConnector, createTransport } from '../transport';
import { NavigationHistory } from '../history';
import { RequestHandle, RequestLifecycleManager, RequestScope, scopeSink } from '../lifecycle';
import { BodyRenderer, FileWriter } from '../renderer';
import { ResponseDispatcher } from '../dispatcher';
import {
  GeminiMetrics,
  Logger,
  MetricsCollector,
  RequestContext,
  TracingHook,
  CompositeTracingHook,
  Timer,
  createRequestContext,
  createNoopLogger,
  createMetricsCollector,
} from '../observability';

/** Status message shown once a request has settled. */
export const READY_STATUS = 'Ready';

/**
 * Gemini client options.
 */
export interface GeminiClientOptions extends GeminiConfigOptions {
  /** Where pages, prompts and errors are shown. */
  sink: PresentationSink;
  /** Transport; defaults to a TLS transport built from the config. */
  transport?: GeminiTransport;
  /** Socket factory for the default transport. */
  connector?: SocketConnector;
  /** Writer for downloaded bodies. */
  writeFile?: FileWriter;
  /** Logger instance. */
  logger?: Logger;
  /** Tracing hooks. */
  tracingHooks?: TracingHook[];
}

/**
 * State shared by every fetch of one navigation.
 */
interface Navigation {
  scope: RequestScope;
  sink: PresentationSink;
  fromHistory: boolean;
  context: RequestContext;
  logger: Logger;
}

/**
 * Gemini client.
 *
 * Each navigation runs in its own request scope; starting one cancels the
 * previous one before any of its work runs.
 */
export class GeminiClient {
  private readonly config: GeminiConfig;
  private readonly sink: PresentationSink;
  private readonly transport: GeminiTransport;
  private readonly history: NavigationHistory;
  private readonly lifecycle: RequestLifecycleManager;
  private readonly dispatcher: ResponseDispatcher;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly tracingHooks: CompositeTracingHook;
  private closed = false;

  constructor(options: GeminiClientOptions) {
    this.config = createGeminiConfig(options);
    this.sink = options.sink;

    // Set up observability
    this.logger = options.logger ?? createNoopLogger();
    this.metrics = createMetricsCollector();
    this.tracingHooks = new CompositeTracingHook();
    if (options.tracingHooks) {
      for (const hook of options.tracingHooks) {
        this.tracingHooks.addHook(hook);
      }
    }

    this.transport =
      options.transport ??
      createTransport(this.config, {
        connector: options.connector,
        logger: this.logger,
        tracingHook: this.tracingHooks,
      });
    this.history = new NavigationHistory();
    this.lifecycle = new RequestLifecycleManager(this.logger);
    this.dispatcher = new ResponseDispatcher({
      config: this.config,
      history: this.history,
      renderer: new BodyRenderer({ writeFile: options.writeFile, logger: this.logger }),
      logger: this.logger,
      metrics: this.metrics,
    });
  }

  /**
   * Navigates to a user-entered address. The scheme defaults to gemini.
   */
  go(input: string): RequestHandle {
    return this.initiate(parseUrl(input));
  }

  /**
   * Starts a request for a Url, optionally with a query replacing its own.
   */
  initiate(url: Url, query?: string): RequestHandle {
    return this.navigate(url, query, false);
  }

  /**
   * Returns to the previous page.
   */
  back(): RequestHandle {
    this.assertOpen();
    const previous = this.history.popForBack();
    return this.navigate(previous, undefined, true);
  }

  /**
   * Navigates to a link's target.
   */
  follow(link: GemtextLink): RequestHandle {
    return this.go(link.target);
  }

  /**
   * Cancels the request in flight. Returns false if there was none.
   */
  cancel(): boolean {
    const cancelled = this.lifecycle.cancel();
    if (cancelled) {
      this.logger.info('Request cancelled by user');
      this.reportReady();
    }
    return cancelled;
  }

  /** Whether Back has somewhere to go. */
  canGoBack(): boolean {
    return this.history.canGoBack();
  }

  /** The page on top of the history. */
  currentUrl(): Url | undefined {
    return this.history.current();
  }

  /** Visited pages, oldest first. */
  getHistory(): Url[] {
    return this.history.toArray();
  }

  /** Gets current metrics. */
  getMetrics(): GeminiMetrics {
    return this.metrics.getMetrics();
  }

  /** Gets the client configuration. */
  getConfig(): GeminiConfig {
    return this.config;
  }

  /**
   * Handlers for an input source. Failures are shown in an error dialog.
   */
  inputHandlers(): InputHandlers {
    return {
      onGo: (url: string): void => {
        this.guard(() => this.go(url));
      },
      onBack: (): void => {
        this.guard(() => this.back());
      },
    };
  }

  /**
   * Cancels any request in flight and refuses further navigation.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.lifecycle.cancel();
    this.logger.info('Gemini client closed');
  }

  private guard(action: () => RequestHandle): void {
    try {
      action();
    } catch (err) {
      const error = toGeminiError(err);
      this.logger.warn('Navigation rejected', { kind: error.kind, message: error.message });
      this.sink.showErrorDialog(error.message);
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new GeminiError(GeminiErrorKind.Cancelled, 'Client is closed');
    }
  }

  private navigate(url: Url, query: string | undefined, fromHistory: boolean): RequestHandle {
    this.assertOpen();
    return this.lifecycle.run(url, (scope) => this.runNavigation(scope, url, query, fromHistory));
  }

  private async runNavigation(
    scope: RequestScope,
    url: Url,
    query: string | undefined,
    fromHistory: boolean
  ): Promise<void> {
    const address = formatUrl(query === undefined ? url : withQuery(url, query));
    const context = createRequestContext('navigate', address);
    const navigation: Navigation = {
      scope,
      sink: scopeSink(this.sink, scope),
      fromHistory,
      context,
      logger: this.logger.withContext(context),
    };
    const timer = Timer.start();

    try {
      this.metrics.recordRequestStarted();
      this.tracingHooks.onRequestStart(context, address);
      await this.fetch(url, query, 0, navigation);
      if (scope.isActive) {
        this.metrics.recordRequestCompleted(timer.elapsed());
        this.tracingHooks.onRequestSuccess(context, timer.elapsed());
      }
    } catch (err) {
      if (scope.isActive) {
        const error = toGeminiError(err);
        navigation.logger.warn('Request failed', {
          kind: error.kind,
          status: error.statusCode,
          message: error.message,
        });
        this.metrics.recordRequestFailed();
        this.tracingHooks.onRequestError(context, error, timer.elapsed());
        navigation.sink.showErrorDialog(error.message);
      }
    } finally {
      if (scope.isCancelled) {
        navigation.logger.debug('Request cancelled', { url: address });
        this.metrics.recordRequestCancelled();
        this.tracingHooks.onRequestCancelled(context);
      } else {
        this.reportReady(navigation.sink, url);
      }
    }
  }

  /**
   * One request/response exchange. Redirects and input submissions recurse
   * through the dispatcher's follow-up callback.
   */
  private async fetch(
    url: Url,
    query: string | undefined,
    redirects: number,
    navigation: Navigation
  ): Promise<void> {
    navigation.scope.throwIfCancelled();
    const sourceUrl = query === undefined ? url : withQuery(url, query);
    navigation.sink.setStatusMessage(`Loading ${formatUrl(sourceUrl)}`);

    const { statusLine, body } = await this.transport.connectAndSend(
      url,
      query,
      navigation.scope.signal
    );
    const release = navigation.scope.register(body);

    try {
      const { code, meta } = parseStatus(statusLine);
      navigation.logger.debug('Response', { status: code, meta, url: formatUrl(sourceUrl) });
      this.tracingHooks.onStatus(navigation.context, code, meta);

      await this.dispatcher.dispatch(
        { status: code, meta, body, sourceUrl },
        {
          scope: navigation.scope,
          sink: navigation.sink,
          redirects,
          fromHistory: navigation.fromHistory,
          follow: (next, nextQuery, nextRedirects) =>
            this.fetch(next, nextQuery, nextRedirects, navigation),
        }
      );
    } finally {
      body.close();
      release();
    }
  }

  private reportReady(sink: PresentationSink = this.sink, fallback?: Url): void {
    const current = this.history.current() ?? fallback;
    if (current) {
      sink.setAddress(formatUrl(current));
    }
    sink.setStatusMessage(READY_STATUS);
  }
}

/**
 * Builder for GeminiClient.
 */
export class GeminiClientBuilder {
  private readonly configBuilder = new GeminiConfigBuilder();
  private readonly options: Partial<GeminiClientOptions> = {};

  /** Sets the presentation sink. */
  sink(sink: PresentationSink): this {
    this.options.sink = sink;
    return this;
  }

  /** Sets connect timeout. */
  connectTimeout(ms: number): this {
    this.configBuilder.connectTimeout(ms);
    return this;
  }

  /** Sets status line read timeout. */
  readTimeout(ms: number): this {
    this.configBuilder.readTimeout(ms);
    return this;
  }

  /** Sets the redirect limit. */
  maxRedirects(count: number): this {
    this.configBuilder.maxRedirects(count);
    return this;
  }

  /** Sets TLS options. */
  tls(config: Partial<TlsConfig>): this {
    this.configBuilder.tls(config);
    return this;
  }

  /** Enables certificate chain verification. */
  verifyCertificates(): this {
    this.configBuilder.verifyCertificates();
    return this;
  }

  /** Sets the history policy. */
  historyPolicy(policy: HistoryPolicy): this {
    this.configBuilder.historyPolicy(policy);
    return this;
  }

  /** Sets the transport. */
  transport(transport: GeminiTransport): this {
    this.options.transport = transport;
    return this;
  }

  /** Sets the socket connector for the default transport. */
  connector(connector: SocketConnector): this {
    this.options.connector = connector;
    return this;
  }

  /** Sets the writer for downloads. */
  writeFile(writer: FileWriter): this {
    this.options.writeFile = writer;
    return this;
  }

  /** Sets the logger. */
  logger(logger: Logger): this {
    this.options.logger = logger;
    return this;
  }

  /** Adds a tracing hook. */
  tracingHook(hook: TracingHook): this {
    this.options.tracingHooks = this.options.tracingHooks ?? [];
    this.options.tracingHooks.push(hook);
    return this;
  }

  /** Builds the client. */
  build(): GeminiClient {
    const { sink } = this.options;
    if (!sink) {
      throw GeminiError.configuration('Presentation sink is required');
    }
    return new GeminiClient({ ...this.options, ...this.configBuilder.toOptions(), sink });
  }
}

/**
 * Creates a Gemini client.
 */
export function createGeminiClient(options: GeminiClientOptions): GeminiClient {
  return new GeminiClient(options);
}

/**
 * Creates a Gemini client builder.
 */
export function geminiClient(): GeminiClientBuilder {
  return new GeminiClientBuilder();
}
