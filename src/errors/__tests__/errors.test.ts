import { describe, it, expect } from 'vitest';
import {
  ErrorCategory,
  ErrorSeverity,
  GeminiError,
  GeminiErrorKind,
  isGeminiError,
  toGeminiError,
} from '../index';

describe('GeminiError', () => {
  describe('fromStatus', () => {
    it('should name temporary failures', () => {
      expect(GeminiError.fromStatus(40, 'try later').message).toBe('Temporary failure: try later');
      expect(GeminiError.fromStatus(41, 'maintenance').message).toBe('Server unavailable: maintenance');
      expect(GeminiError.fromStatus(42, 'script died').message).toBe('CGI error: script died');
      expect(GeminiError.fromStatus(43, 'upstream').message).toBe('Proxy error: upstream');
    });

    it('should fall back to a generic name for unnamed 4x codes', () => {
      const error = GeminiError.fromStatus(47, 'odd');

      expect(error.kind).toBe(GeminiErrorKind.TemporaryFailure);
      expect(error.message).toBe('Temporary failure: odd');
      expect(error.statusCode).toBe(47);
      expect(error.meta).toBe('odd');
    });

    it('should report rate limiting with the wait time', () => {
      const error = GeminiError.fromStatus(44, '30');

      expect(error.kind).toBe(GeminiErrorKind.RateLimited);
      expect(error.message).toBe('Rate limited: slow down and retry in 30 seconds');
    });

    it('should name permanent failures', () => {
      expect(GeminiError.fromStatus(50, 'no').message).toBe('Permanent failure: no');
      expect(GeminiError.fromStatus(51, 'missing').message).toBe('Not found: missing');
      expect(GeminiError.fromStatus(52, 'removed').message).toBe('Gone: removed');
      expect(GeminiError.fromStatus(53, 'refused').message).toBe('Proxy request refused: refused');
      expect(GeminiError.fromStatus(54, 'bad').message).toBe('Bad request: bad');
      expect(GeminiError.fromStatus(59, 'bad').message).toBe('Bad request: bad');
      expect(GeminiError.fromStatus(57, 'other').message).toBe('Permanent failure: other');
    });

    it('should treat codes outside the failure ranges as unknown', () => {
      const error = GeminiError.fromStatus(62, 'certificate');

      expect(error.kind).toBe(GeminiErrorKind.UnknownStatus);
      expect(error.message).toBe('Unknown response: 62 certificate');
    });
  });

  describe('category', () => {
    it('should map kinds onto the taxonomy', () => {
      expect(GeminiError.connection('down').category()).toBe(ErrorCategory.Connection);
      expect(GeminiError.tls('bad cert').category()).toBe(ErrorCategory.Connection);
      expect(GeminiError.malformedHeader('x').category()).toBe(ErrorCategory.MalformedHeader);
      expect(GeminiError.protocol('x').category()).toBe(ErrorCategory.Protocol);
      expect(GeminiError.fromStatus(51, 'x').category()).toBe(ErrorCategory.Response);
      expect(GeminiError.fromStatus(70, 'x').category()).toBe(ErrorCategory.UnknownStatus);
      expect(GeminiError.noHistory().category()).toBe(ErrorCategory.Navigation);
      expect(GeminiError.tooManyRedirects(5).category()).toBe(ErrorCategory.Navigation);
      expect(GeminiError.io('disk').category()).toBe(ErrorCategory.Io);
      expect(GeminiError.cancelled().category()).toBe(ErrorCategory.Cancelled);
      expect(GeminiError.configuration('x').category()).toBe(ErrorCategory.Configuration);
    });
  });

  describe('severity', () => {
    it('should rank configuration errors as critical', () => {
      expect(GeminiError.configuration('x').severity()).toBe(ErrorSeverity.Critical);
    });

    it('should rank cancellation as informational', () => {
      expect(GeminiError.cancelled().severity()).toBe(ErrorSeverity.Info);
    });

    it('should rank server failures as warnings', () => {
      expect(GeminiError.fromStatus(41, 'x').severity()).toBe(ErrorSeverity.Warning);
    });
  });

  it('should quote the offending line in malformed header errors', () => {
    expect(GeminiError.malformedHeader('20').message).toBe('Malformed status line: "20"');
  });

  it('should describe the redirect limit', () => {
    const error = GeminiError.tooManyRedirects(3);

    expect(error.kind).toBe(GeminiErrorKind.TooManyRedirects);
    expect(error.message).toBe('Too many redirects (limit 3)');
  });

  it('should serialize to JSON', () => {
    expect(GeminiError.fromStatus(51, 'missing').toJSON()).toEqual({
      name: 'GeminiError',
      kind: GeminiErrorKind.PermanentFailure,
      category: ErrorCategory.Response,
      message: 'Not found: missing',
      statusCode: 51,
      meta: 'missing',
      severity: ErrorSeverity.Warning,
    });
  });
});

describe('toGeminiError', () => {
  it('should return GeminiErrors unchanged', () => {
    const error = GeminiError.io('disk');
    expect(toGeminiError(error)).toBe(error);
  });

  it('should wrap plain errors and keep the cause', () => {
    const cause = new Error('boom');
    const error = toGeminiError(cause);

    expect(isGeminiError(error)).toBe(true);
    expect(error.message).toBe('boom');
    expect(error.cause).toBe(cause);
  });

  it('should wrap non-error values', () => {
    expect(toGeminiError('oops').message).toBe('oops');
  });
});
