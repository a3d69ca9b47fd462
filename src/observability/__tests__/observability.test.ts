import { describe, it, expect, vi } from 'vitest';
import {
  CompositeTracingHook,
  ConsoleLogger,
  LogLevel,
  MetricsCollector,
  createRequestContext,
} from '../index';
import { StatusGroup } from '../../protocol';

describe('ConsoleLogger', () => {
  it('should format entries on one line', () => {
    const logger = new ConsoleLogger();
    const line = logger.format({
      level: LogLevel.Info,
      message: 'Saved download',
      timestamp: new Date('2024-01-02T03:04:05.000Z'),
      fields: { bytes: 3 },
    });

    expect(line).toBe('2024-01-02T03:04:05.000Z [INFO] Saved download {"bytes":3}');
  });

  it('should include the navigation and status', () => {
    const context = createRequestContext('navigate', 'gemini://h/missing');
    const line = new ConsoleLogger().format({
      level: LogLevel.Warn,
      message: 'Request failed',
      timestamp: new Date('2024-01-02T03:04:05.000Z'),
      context,
      status: 51,
    });

    expect(line).toBe(
      `2024-01-02T03:04:05.000Z [WARN] [${context.requestId}] gemini://h/missing [51] Request failed`
    );
  });

  it('should give each request context its own id', () => {
    const first = createRequestContext('navigate', 'gemini://h/');
    const second = createRequestContext('navigate', 'gemini://h/');

    expect(first.requestId).not.toBe(second.requestId);
    expect(first.requestId.startsWith('navigate-')).toBe(true);
  });

  it('should lift a numeric status field out of the fields', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const context = createRequestContext('navigate', 'gemini://h/');

    new ConsoleLogger().withContext(context).warn('Request failed', { status: 40, kind: 'temporary_failure' });

    const line = String(warn.mock.calls[0]?.[0]);
    expect(line.endsWith(`[${context.requestId}] gemini://h/ [40] Request failed {"kind":"temporary_failure"}`)).toBe(
      true
    );
    warn.mockRestore();
  });

  it('should drop entries below the minimum level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const logger = new ConsoleLogger(LogLevel.Warn);
    logger.debug('hidden');
    logger.warn('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);

    debug.mockRestore();
    warn.mockRestore();
  });
});

describe('MetricsCollector', () => {
  it('should count responses by group', () => {
    const metrics = new MetricsCollector();
    metrics.recordResponse(StatusGroup.Success);
    metrics.recordResponse(StatusGroup.Success);
    metrics.recordResponse(StatusGroup.Redirect);

    const snapshot = metrics.getMetrics();
    expect(snapshot.responsesByGroup[StatusGroup.Success]).toBe(2);
    expect(snapshot.responsesByGroup[StatusGroup.Redirect]).toBe(1);
    expect(snapshot.responsesByGroup[StatusGroup.Unknown]).toBe(0);
  });

  it('should compute stats', () => {
    const metrics = new MetricsCollector();
    metrics.recordRequestCompleted(10);
    metrics.recordRequestCompleted(30);
    metrics.recordRequestFailed();

    const stats = metrics.getStats();
    expect(stats.avgLatencyMs).toBe(20);
    expect(stats.p95LatencyMs).toBe(30);
    expect(stats.successRate).toBeCloseTo(2 / 3);
  });

  it('should return copies and reset', () => {
    const metrics = new MetricsCollector();
    metrics.recordBytesSaved(5);
    const snapshot = metrics.getMetrics();
    snapshot.responsesByGroup[StatusGroup.Input] = 99;

    expect(metrics.getMetrics().responsesByGroup[StatusGroup.Input]).toBe(0);
    expect(snapshot.bytesSaved).toBe(5);

    metrics.reset();
    expect(metrics.getMetrics().bytesSaved).toBe(0);
  });
});

describe('CompositeTracingHook', () => {
  it('should delegate to every hook until removed', () => {
    const first = { onStatus: vi.fn() };
    const second = { onStatus: vi.fn() };
    const composite = new CompositeTracingHook();
    composite.addHook(first);
    composite.addHook(second);

    const context = createRequestContext('navigate', 'gemini://h/');
    composite.onStatus(context, 20, 'text/gemini');
    composite.removeHook(first);
    composite.onStatus(context, 51, 'Not found');

    expect(first.onStatus).toHaveBeenCalledTimes(1);
    expect(second.onStatus).toHaveBeenCalledTimes(2);
    expect(second.onStatus).toHaveBeenLastCalledWith(context, 51, 'Not found');
  });
});
