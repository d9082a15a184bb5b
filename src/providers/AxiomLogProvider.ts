/**
 * Axiom log provider.
 * Buffers events and sends them in batches to Axiom's ingest API.
 * Non-blocking — a failed flush keeps the batch for the next attempt, up to
 * `maxBuffered` events; older events are dropped beyond that.
 * Degrades to a no-op when apiToken is empty.
 */

import { LOG_LEVEL_ORDER, type ILogProvider, type LogEvent, type LogLevel } from './ILogProvider.js';

export interface AxiomLogProviderOptions {
  /** Axiom API token (Bearer). Empty string disables sending. */
  apiToken: string;
  /** Axiom dataset name. */
  dataset: string;
  /** Flush after this many buffered events. Default: 50. */
  flushThreshold?: number;
  /** Auto-flush interval in ms. Default: 10_000 (10s). 0 disables. */
  flushIntervalMs?: number;
  /** Upper bound on retained events while Axiom is unreachable. Default: 5_000. */
  maxBuffered?: number;
  /** Drop events below this level. Default: info. */
  minLevel?: LogLevel;
}

const AXIOM_INGEST_URL = 'https://api.axiom.co/v1/datasets';

export class AxiomLogProvider implements ILogProvider {
  private buffer: LogEvent[] = [];
  private readonly apiToken: string;
  private readonly dataset: string;
  private readonly flushThreshold: number;
  private readonly flushIntervalMs: number;
  private readonly maxBuffered: number;
  private readonly minLevel: LogLevel;
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private readonly enabled: boolean;

  /** Number of flush attempts that did not reach Axiom. */
  failedFlushes = 0;
  /** Most recent delivery failure; cleared by the next successful flush. */
  lastError: string | null = null;

  constructor(options: AxiomLogProviderOptions) {
    this.apiToken = options.apiToken;
    this.dataset = options.dataset;
    this.flushThreshold = options.flushThreshold ?? 50;
    this.flushIntervalMs = options.flushIntervalMs ?? 10_000;
    this.maxBuffered = options.maxBuffered ?? 5_000;
    this.minLevel = options.minLevel ?? 'info';
    this.enabled = Boolean(this.apiToken);

    if (this.enabled && this.flushIntervalMs > 0) {
      this.flushTimer = setInterval(() => {
        void this.flush();
      }, this.flushIntervalMs);
      // Don't hold the process open for the timer
      this.flushTimer.unref();
    }
  }

  log(event: LogEvent): void {
    if (!this.enabled) return;
    if (LOG_LEVEL_ORDER[event.level] < LOG_LEVEL_ORDER[this.minLevel]) return;

    const stamped: LogEvent = {
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
    };
    this.buffer.push(stamped);

    if (this.buffer.length > this.maxBuffered) {
      this.buffer.splice(0, this.buffer.length - this.maxBuffered);
    }

    if (this.buffer.length >= this.flushThreshold) {
      void this.flush();
    }
  }

  async flush(): Promise<void> {
    if (!this.enabled || this.buffer.length === 0) return;

    const batch = [...this.buffer];

    try {
      const response = await fetch(
        `${AXIOM_INGEST_URL}/${this.dataset}/ingest`,
        {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${this.apiToken}`,
          },
          body: JSON.stringify(batch.map(toAxiomEvent)),
        }
      );

      if (response.ok) {
        // Only clear the events that were in this batch
        this.buffer.splice(0, batch.length);
        this.lastError = null;
      } else {
        this.recordFailure(`ingest returned ${response.status}`);
      }
    } catch (err) {
      this.recordFailure(err instanceof Error ? err.message : String(err));
    }
  }

  /** Stop the auto-flush timer and flush remaining events. */
  async dispose(): Promise<void> {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    await this.flush();
  }

  /** Events waiting for delivery. */
  get pending(): number {
    return this.buffer.length;
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'info', message, fields });
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'warn', message, fields });
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'error', message, fields });
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'debug', message, fields });
  }

  private recordFailure(reason: string): void {
    // Events stay buffered for the next flush
    this.failedFlushes++;
    this.lastError = reason;
  }
}

/** Axiom expects `_time`; structured fields are flattened to the top level. */
function toAxiomEvent(event: LogEvent): Record<string, unknown> {
  const { timestamp, fields, ...rest } = event;
  return { _time: timestamp, ...rest, ...fields };
}
