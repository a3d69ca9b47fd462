/**
 * Gemini Protocol Client
 *
 * A Gemini client engine: TLS transport, status line parsing, gemtext
 * rendering into a pluggable presentation sink, navigation history and
 * cancellable request scopes.
 *
 * @example
 * ```typescript
 * import { geminiClient, HistoryPolicy } from 'gemini-protocol-client';
 *
 * // Create client
 * const client = geminiClient()
 *   .sink(mySink)
 *   .maxRedirects(5)
 *   .historyPolicy(HistoryPolicy.NonRedirect)
 *   .build();
 *
 * // Navigate; starting another navigation cancels this one
 * const request = client.go('gemini.example/index.gmi');
 * await request.done;
 *
 * if (client.canGoBack()) {
 *   await client.back().done;
 * }
 *
 * client.close();
 * ```
 *
 * @packageDocumentation
 */

// Re-export errors
export {
  GeminiError,
  GeminiErrorKind,
  ErrorCategory,
  ErrorSeverity,
  isGeminiError,
  toGeminiError,
} from './errors';

// Re-export config
export type { GeminiConfig, GeminiConfigOptions, TlsConfig } from './config';
export {
  // Enums
  TlsVersion,
  HistoryPolicy,
  // Constants
  DEFAULT_PORT,
  DEFAULT_CONNECT_TIMEOUT,
  DEFAULT_READ_TIMEOUT,
  DEFAULT_MAX_REDIRECTS,
  DEFAULT_TLS_CONFIG,
  // Functions
  createGeminiConfig,
  validateConfig,
  // Builders
  GeminiConfigBuilder,
} from './config';

// Re-export types
export type {
  Url,
  HeadingLevel,
  GemtextLink,
  GemtextHeading,
  GemtextText,
  GemtextElement,
  ResponseBody,
  GeminiResponse,
  PresentationSink,
  InputHandlers,
} from './types';
export { GEMINI_SCHEME, parseUrl, formatUrl, withQuery, urlsEqual } from './types';

// Re-export protocol
export type { StatusLine } from './protocol';
export {
  CRLF,
  MAX_STATUS_LINE_LENGTH,
  MAX_REQUEST_URL_LENGTH,
  StatusGroup,
  statusGroup,
  parseStatus,
  isRedirectStatus,
  isSensitiveInput,
  formatRequestLine,
} from './protocol';

// Re-export mime
export type { MediaType } from './mime';
export {
  GEMTEXT_MIME_TYPE,
  DEFAULT_CHARSET,
  BodyKind,
  parseMediaType,
  classifyBody,
  charsetOf,
} from './mime';

// Re-export gemtext
export {
  resolveLink,
  parseLink,
  parseHeading,
  parseLine,
  parseGemtext,
  parseGemtextStream,
  extractLinks,
} from './gemtext';

// Re-export transport
export type {
  ConnectTarget,
  SocketConnector,
  TransportResponse,
  GeminiTransport,
  TransportOptions,
} from './transport';
export {
  StatusLineReader,
  LineSplitter,
  BodyStream,
  TlsTransport,
  readStatusLine,
  classifyConnectError,
  createTlsConnector,
  createTransport,
} from './transport';

// Re-export history
export { NavigationHistory } from './history';

// Re-export lifecycle
export type { ClosableResource, RequestWork, RequestHandle } from './lifecycle';
export { ScopeState, RequestScope, RequestLifecycleManager, scopeSink } from './lifecycle';

// Re-export renderer
export type { FileWriter, RenderResult, BodyRendererOptions } from './renderer';
export { DEFAULT_DOWNLOAD_NAME, suggestFileName, BodyRenderer } from './renderer';

// Re-export dispatcher
export type { FollowUp, DispatchContext, ResponseDispatcherOptions } from './dispatcher';
export { DispatchOutcome, ResponseDispatcher } from './dispatcher';

// Re-export observability
export type {
  LogEntry,
  RequestContext,
  Logger,
  GeminiMetrics,
  TracingHook,
} from './observability';
export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  MetricsCollector,
  Timer,
  CompositeTracingHook,
  createRequestContext,
  createLogger,
  createNoopLogger,
  createMetricsCollector,
  createEmptyMetrics,
} from './observability';

// Re-export client
export type { GeminiClientOptions } from './client';
export {
  READY_STATUS,
  GeminiClient,
  GeminiClientBuilder,
  createGeminiClient,
  geminiClient,
} from './client';

// Re-export mocks
export type { MockReply, SinkEvent } from './mocks';
export {
  MockSocket,
  MockGeminiServer,
  RecordingSink,
  MemoryFileWriter,
  createMockServer,
  createRecordingSink,
} from './mocks';
