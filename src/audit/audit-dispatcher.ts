/**
 * AuditDispatcher - delivers findings to a sink without blocking scans.
 *
 * Findings wait in a bounded buffer and are written in order. A failed
 * write is retried with exponential backoff; a finding that exhausts its
 * attempts, or is pushed out of a full buffer (oldest first), is dropped
 * and announced with a 'dropped' event. Nothing is dropped silently.
 */

import pino from 'pino';
import { EventEmitter } from 'events';
import { setTimeout as sleep } from 'timers/promises';
import { ErrorCode, SinkError, errorMessage } from '../shared/errors.js';
import type { Finding } from '../shared/types.js';
import type { AuditSink } from './audit-sink.js';

const logger = pino({ name: 'leakguard:audit', level: process.env['LOG_LEVEL'] ?? 'info' });

// ─── Configuration ───────────────────────────────────────────

export interface DispatcherConfig {
  /** Findings held while the sink is slow or failing. Default: 1000 */
  bufferSize?: number;
  /** Write attempts per finding. Default: 8 */
  maxAttempts?: number;
  /** First retry delay. Default: 50 */
  baseBackoffMs?: number;
  /** Retry delay ceiling. Default: 5000 */
  maxBackoffMs?: number;
}

export interface DispatcherStats {
  buffered: number;
  delivered: number;
  dropped: number;
  retries: number;
}

export interface DispatcherEvents {
  'dropped': (finding: Readonly<Finding>, error: SinkError) => void;
}

interface Pending {
  finding: Readonly<Finding>;
  attempts: number;
}

/** Delay before retry number `attempt` (1-based). */
export function backoffDelay(attempt: number, baseMs: number, maxMs: number): number {
  return Math.min(maxMs, baseMs * 2 ** (attempt - 1));
}

// ─── Audit Dispatcher Class ──────────────────────────────────

export interface AuditDispatcher {
  on<E extends keyof DispatcherEvents>(event: E, listener: DispatcherEvents[E]): this;
  emit<E extends keyof DispatcherEvents>(event: E, ...args: Parameters<DispatcherEvents[E]>): boolean;
}

export class AuditDispatcher extends EventEmitter {
  readonly sink: AuditSink;
  private readonly config: Required<DispatcherConfig>;
  private buffer: Pending[] = [];
  private pumping: Promise<void> | null = null;
  /** Entry whose write is in progress; overflow never takes it. */
  private inFlight: Pending | null = null;

  private delivered = 0;
  private dropped = 0;
  private retries = 0;

  constructor(sink: AuditSink, config: DispatcherConfig = {}) {
    super();
    this.sink = sink;
    this.config = {
      bufferSize: config.bufferSize ?? 1000,
      maxAttempts: config.maxAttempts ?? 8,
      baseBackoffMs: config.baseBackoffMs ?? 50,
      maxBackoffMs: config.maxBackoffMs ?? 5000,
    };
  }

  /** Queues a finding for delivery. Never blocks, never throws. */
  submit(finding: Readonly<Finding>): void {
    this.buffer.push({ finding, attempts: 0 });

    while (this.buffer.length > this.config.bufferSize) {
      const index = this.buffer[0] === this.inFlight ? 1 : 0;
      const [oldest] = this.buffer.splice(index, 1);
      if (oldest) {
        this.drop(
          oldest,
          new SinkError(ErrorCode.SINK_BUFFER_OVERFLOW, `Audit buffer full (${this.config.bufferSize})`, {
            findingId: oldest.finding.id,
          })
        );
      }
    }

    if (!this.pumping) {
      this.pumping = this.pump().finally(() => {
        this.pumping = null;
      });
    }
  }

  /** Resolves once every submitted finding was delivered or dropped. */
  async flush(): Promise<void> {
    while (this.pumping) {
      await this.pumping;
    }
  }

  getStats(): DispatcherStats {
    return {
      buffered: this.buffer.length,
      delivered: this.delivered,
      dropped: this.dropped,
      retries: this.retries,
    };
  }

  // ─── Delivery ────────────────────────────────────────────────

  private async pump(): Promise<void> {
    let head = this.buffer[0];
    while (head) {
      this.inFlight = head;
      try {
        await this.sink.record(head.finding);
        this.delivered++;
        this.remove(head);
      } catch (error) {
        head.attempts++;
        if (head.attempts >= this.config.maxAttempts) {
          this.remove(head);
          this.drop(
            head,
            new SinkError(ErrorCode.SINK_RETRIES_EXHAUSTED, `Audit write failed ${head.attempts} times`, {
              findingId: head.finding.id,
              lastError: errorMessage(error),
            })
          );
        } else {
          this.retries++;
          const delay = backoffDelay(head.attempts, this.config.baseBackoffMs, this.config.maxBackoffMs);
          logger.warn(
            { findingId: head.finding.id, attempt: head.attempts, delayMs: delay, error: errorMessage(error) },
            'Audit write failed, retrying'
          );
          await sleep(delay);
        }
      } finally {
        this.inFlight = null;
      }
      head = this.buffer[0];
    }
  }

  /** Removes the entry if it is still buffered; overflow may have taken it. */
  private remove(entry: Pending): void {
    const index = this.buffer.indexOf(entry);
    if (index !== -1) this.buffer.splice(index, 1);
  }

  private drop(entry: Pending, error: SinkError): void {
    this.dropped++;
    logger.error({ findingId: entry.finding.id, code: error.code, error: error.message }, 'Audit record dropped');
    this.emit('dropped', entry.finding, error);
  }
}

export default AuditDispatcher;
