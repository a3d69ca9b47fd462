/**
 * Error types for the Gemini client.
 */

/**
 * Gemini error kinds categorizing different failure modes.
 */
export enum GeminiErrorKind {
  // Connection errors
  ConnectionFailed = 'connection_failed',
  ConnectTimeout = 'connect_timeout',
  TlsHandshakeFailed = 'tls_handshake_failed',

  // Header errors
  MalformedHeader = 'malformed_header',

  // Protocol errors
  ProtocolViolation = 'protocol_violation',
  ReadTimeout = 'read_timeout',
  UnsupportedScheme = 'unsupported_scheme',

  // Server-reported failures
  TemporaryFailure = 'temporary_failure',
  RateLimited = 'rate_limited',
  PermanentFailure = 'permanent_failure',
  UnknownStatus = 'unknown_status',

  // Navigation errors
  InvalidUrl = 'invalid_url',
  TooManyRedirects = 'too_many_redirects',
  NoHistory = 'no_history',

  // Local I/O
  Io = 'io',

  // Cancellation
  Cancelled = 'cancelled',

  // Configuration errors
  ConfigurationInvalid = 'configuration_invalid',
}

/**
 * Broad error taxonomy used when reporting failures.
 */
export enum ErrorCategory {
  Connection = 'connection',
  MalformedHeader = 'malformed_header',
  Protocol = 'protocol',
  Response = 'response',
  UnknownStatus = 'unknown_status',
  Navigation = 'navigation',
  Io = 'io',
  Cancelled = 'cancelled',
  Configuration = 'configuration',
}

/**
 * Error severity levels.
 */
export enum ErrorSeverity {
  Info = 'info',
  Warning = 'warning',
  Error = 'error',
  Critical = 'critical',
}

/**
 * Gemini error with detailed information.
 */
export class GeminiError extends Error {
  /** Error kind. */
  readonly kind: GeminiErrorKind;
  /** Status code reported by the server, if any. */
  readonly statusCode?: number;
  /** Meta field of the status line, if any. */
  readonly meta?: string;
  /** Underlying cause. */
  readonly cause?: Error;

  constructor(
    kind: GeminiErrorKind,
    message: string,
    options?: {
      statusCode?: number;
      meta?: string;
      cause?: Error;
    }
  ) {
    super(message);
    this.name = 'GeminiError';
    this.kind = kind;
    this.statusCode = options?.statusCode;
    this.meta = options?.meta;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GeminiError);
    }
  }

  /**
   * Returns the taxonomy bucket for this error.
   */
  category(): ErrorCategory {
    switch (this.kind) {
      case GeminiErrorKind.ConnectionFailed:
      case GeminiErrorKind.ConnectTimeout:
      case GeminiErrorKind.TlsHandshakeFailed:
        return ErrorCategory.Connection;

      case GeminiErrorKind.MalformedHeader:
        return ErrorCategory.MalformedHeader;

      case GeminiErrorKind.ProtocolViolation:
      case GeminiErrorKind.ReadTimeout:
      case GeminiErrorKind.UnsupportedScheme:
        return ErrorCategory.Protocol;

      case GeminiErrorKind.TemporaryFailure:
      case GeminiErrorKind.RateLimited:
      case GeminiErrorKind.PermanentFailure:
        return ErrorCategory.Response;

      case GeminiErrorKind.UnknownStatus:
        return ErrorCategory.UnknownStatus;

      case GeminiErrorKind.InvalidUrl:
      case GeminiErrorKind.TooManyRedirects:
      case GeminiErrorKind.NoHistory:
        return ErrorCategory.Navigation;

      case GeminiErrorKind.Io:
        return ErrorCategory.Io;

      case GeminiErrorKind.Cancelled:
        return ErrorCategory.Cancelled;

      case GeminiErrorKind.ConfigurationInvalid:
        return ErrorCategory.Configuration;
    }
  }

  /**
   * Returns the error severity.
   */
  severity(): ErrorSeverity {
    switch (this.category()) {
      case ErrorCategory.Configuration:
        return ErrorSeverity.Critical;

      case ErrorCategory.Connection:
      case ErrorCategory.Response:
        return ErrorSeverity.Warning;

      case ErrorCategory.Cancelled:
      case ErrorCategory.Navigation:
        return ErrorSeverity.Info;

      default:
        return ErrorSeverity.Error;
    }
  }

  /**
   * Creates a connection error.
   */
  static connection(message: string, cause?: Error): GeminiError {
    return new GeminiError(GeminiErrorKind.ConnectionFailed, message, { cause });
  }

  /**
   * Creates a TLS handshake error.
   */
  static tls(message: string, cause?: Error): GeminiError {
    return new GeminiError(GeminiErrorKind.TlsHandshakeFailed, message, { cause });
  }

  /**
   * Creates a timeout error.
   */
  static timeout(kind: GeminiErrorKind, message: string): GeminiError {
    return new GeminiError(kind, message);
  }

  /**
   * Creates a malformed header error.
   */
  static malformedHeader(line: string): GeminiError {
    return new GeminiError(GeminiErrorKind.MalformedHeader, `Malformed status line: ${JSON.stringify(line)}`);
  }

  /**
   * Creates a protocol violation error.
   */
  static protocol(message: string): GeminiError {
    return new GeminiError(GeminiErrorKind.ProtocolViolation, message);
  }

  /**
   * Creates an invalid URL error.
   */
  static invalidUrl(input: string, cause?: Error): GeminiError {
    return new GeminiError(GeminiErrorKind.InvalidUrl, `Invalid URL: ${input}`, { cause });
  }

  /**
   * Creates a no-history error.
   */
  static noHistory(): GeminiError {
    return new GeminiError(GeminiErrorKind.NoHistory, 'No previous page in history');
  }

  /**
   * Creates a redirect limit error.
   */
  static tooManyRedirects(limit: number): GeminiError {
    return new GeminiError(GeminiErrorKind.TooManyRedirects, `Too many redirects (limit ${limit})`);
  }

  /**
   * Creates an I/O error.
   */
  static io(message: string, cause?: Error): GeminiError {
    return new GeminiError(GeminiErrorKind.Io, message, { cause });
  }

  /**
   * Creates a cancellation error.
   */
  static cancelled(): GeminiError {
    return new GeminiError(GeminiErrorKind.Cancelled, 'Request cancelled');
  }

  /**
   * Creates a configuration error.
   */
  static configuration(message: string): GeminiError {
    return new GeminiError(GeminiErrorKind.ConfigurationInvalid, message);
  }

  /**
   * Creates an error from a failure status line.
   */
  static fromStatus(code: number, meta: string): GeminiError {
    if (code === 44) {
      return new GeminiError(
        GeminiErrorKind.RateLimited,
        `Rate limited: slow down and retry in ${meta} seconds`,
        { statusCode: code, meta }
      );
    }

    const name = FAILURE_NAMES[code];

    if (code >= 40 && code <= 49) {
      return new GeminiError(
        GeminiErrorKind.TemporaryFailure,
        `${name ?? 'Temporary failure'}: ${meta}`,
        { statusCode: code, meta }
      );
    }

    if (code >= 50 && code <= 59) {
      return new GeminiError(
        GeminiErrorKind.PermanentFailure,
        `${name ?? 'Permanent failure'}: ${meta}`,
        { statusCode: code, meta }
      );
    }

    return new GeminiError(GeminiErrorKind.UnknownStatus, `Unknown response: ${code} ${meta}`, {
      statusCode: code,
      meta,
    });
  }

  /**
   * Converts to JSON.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      category: this.category(),
      message: this.message,
      statusCode: this.statusCode,
      meta: this.meta,
      severity: this.severity(),
    };
  }
}

/** Display names of failure statuses. */
const FAILURE_NAMES: Readonly<Record<number, string>> = {
  40: 'Temporary failure',
  41: 'Server unavailable',
  42: 'CGI error',
  43: 'Proxy error',
  50: 'Permanent failure',
  51: 'Not found',
  52: 'Gone',
  53: 'Proxy request refused',
  54: 'Bad request',
  59: 'Bad request',
};

/**
 * Type guard for GeminiError.
 */
export function isGeminiError(error: unknown): error is GeminiError {
  return error instanceof GeminiError;
}

/**
 * Wraps any thrown value in a GeminiError.
 */
export function toGeminiError(error: unknown): GeminiError {
  if (isGeminiError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new GeminiError(GeminiErrorKind.ProtocolViolation, error.message, { cause: error });
  }
  return new GeminiError(GeminiErrorKind.ProtocolViolation, String(error));
}
