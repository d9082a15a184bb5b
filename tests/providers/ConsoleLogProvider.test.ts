import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConsoleLogProvider, formatLine } from '../../src/providers/ConsoleLogProvider.js';
import type { AnalysisLogEvent } from '../../src/providers/ILogProvider.js';

describe('ConsoleLogProvider', () => {
  let provider: ConsoleLogProvider;

  beforeEach(() => {
    provider = new ConsoleLogProvider();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  // --- log() ---

  it('should buffer events with a timestamp', () => {
    provider.log({ level: 'info', message: 'analysis' });
    expect(provider.events).toHaveLength(1);
    const ts = provider.events[0].timestamp ?? '';
    expect(new Date(ts).toISOString()).toBe(ts);
  });

  it('should preserve a provided timestamp', () => {
    provider.log({ level: 'warn', message: 'fallback', timestamp: '2026-01-15T12:00:00.000Z' });
    expect(provider.events[0].timestamp).toBe('2026-01-15T12:00:00.000Z');
  });

  it('should keep the extra properties of an analysis event', () => {
    const event: AnalysisLogEvent = {
      level: 'info',
      message: 'analysis',
      analysisType: 'circularity',
      durationMs: 12,
      gapCount: 1,
      predictedCount: 1,
      lowConfidenceCount: 0,
    };
    provider.log(event);
    expect(provider.events[0]).toMatchObject({ analysisType: 'circularity', gapCount: 1 });
  });

  // --- convenience methods ---

  it('should log at the level of each convenience method', () => {
    provider.debug('d');
    provider.info('i');
    provider.warn('w', { parameter: 'recycling_rate' });
    provider.error('e');
    expect(provider.events.map((e) => e.level)).toEqual(['debug', 'info', 'warn', 'error']);
    expect(provider.events[2].fields).toEqual({ parameter: 'recycling_rate' });
  });

  // --- minLevel ---

  it('should drop events below the minimum level', () => {
    const quiet = new ConsoleLogProvider({ minLevel: 'warn' });
    quiet.debug('d');
    quiet.info('i');
    quiet.warn('w');
    expect(quiet.events).toHaveLength(1);
    expect(quiet.events[0].message).toBe('w');
  });

  // --- byLevel() / clear() ---

  it('byLevel() should filter buffered events', () => {
    provider.info('one');
    provider.error('two');
    provider.info('three');
    expect(provider.byLevel('info').map((e) => e.message)).toEqual(['one', 'three']);
  });

  it('clear() should empty the buffer', () => {
    provider.info('one');
    provider.clear();
    expect(provider.events).toHaveLength(0);
  });

  // --- flush() ---

  it('flush() should resolve immediately', async () => {
    await expect(provider.flush()).resolves.toBeUndefined();
  });

  // --- console output ---

  it('should write info to stdout and warnings to stderr when enabled', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {});
    const err = vi.spyOn(console, 'error').mockImplementation(() => {});
    const loud = new ConsoleLogProvider({ outputToConsole: true });

    loud.info('started');
    loud.warn('fallback');

    expect(out).toHaveBeenCalledTimes(1);
    expect(err).toHaveBeenCalledTimes(1);
    expect(String(err.mock.calls[0][0])).toContain('[WARN] fallback');
  });

  it('should not write to the console by default', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {});
    provider.info('silent');
    expect(out).not.toHaveBeenCalled();
  });

  // --- formatLine() ---

  it('formatLine() should merge extra properties and fields', () => {
    const line = formatLine({
      level: 'info',
      message: 'analysis',
      timestamp: '2026-01-15T12:00:00.000Z',
      fields: { gapCount: 2 },
    });
    expect(line).toBe('2026-01-15T12:00:00.000Z [INFO] analysis {"gapCount":2}');
  });

  it('formatLine() should omit the JSON suffix when there is nothing to add', () => {
    const line = formatLine({ level: 'error', message: 'boom', timestamp: '2026-01-15T12:00:00.000Z' });
    expect(line).toBe('2026-01-15T12:00:00.000Z [ERROR] boom');
  });
});
