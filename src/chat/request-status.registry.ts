// src/chat/request-status.registry.ts
import { Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { nowSeconds } from '../shared/types';

export type RequestState = 'processing' | 'completed' | 'failed';

export interface RequestStatus {
  status: RequestState;
  /** Float seconds since the epoch of the last transition. */
  timestamp: number;
  response?: string;
  error?: string;
}

export interface RegistryOptions {
  terminalStatusTtlMs: number;
  staleProcessingMs: number;
  sweepIntervalMs: number;
}

/**
 * Write access to one request's status. Once a newer request for the same
 * session has started, `complete` and `fail` return false and change nothing.
 */
export interface RequestTicket {
  readonly sessionId: string;
  readonly signal: AbortSignal;
  complete(response: string): boolean;
  fail(error: string, response?: string): boolean;
}

interface Entry {
  status: RequestStatus;
  controller: AbortController;
  startedAt: number;
  finishedAt: number | null;
}

export class RequestStatusRegistry implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RequestStatusRegistry.name);
  private readonly entries = new Map<string, Entry>();
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly options: RegistryOptions,
    private readonly now: () => number = Date.now,
  ) {}

  onModuleInit(): void {
    this.timer = setInterval(() => this.sweep(), this.options.sweepIntervalMs);
    this.timer.unref();
  }

  onModuleDestroy(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Registers a new `processing` request, replacing whatever the session had. */
  start(sessionId: string): RequestTicket {
    const startedAt = this.now();
    const entry: Entry = {
      status: { status: 'processing', timestamp: nowSeconds(startedAt) },
      controller: new AbortController(),
      startedAt,
      finishedAt: null,
    };
    this.entries.set(sessionId, entry);

    return {
      sessionId,
      signal: entry.controller.signal,
      complete: (response) => this.finish(sessionId, entry, { status: 'completed', response }),
      fail: (error, response) =>
        this.finish(sessionId, entry, {
          status: 'failed',
          error,
          ...(response !== undefined ? { response } : {}),
        }),
    };
  }

  get(sessionId: string): RequestStatus | null {
    const entry = this.entries.get(sessionId);
    return entry ? { ...entry.status } : null;
  }

  clear(sessionId: string): boolean {
    return this.entries.delete(sessionId);
  }

  /**
   * Drops terminal statuses past their retention and aborts `processing`
   * requests that have been running for too long. Returns the evicted ids.
   */
  sweep(): string[] {
    const now = this.now();
    const evicted: string[] = [];

    for (const [sessionId, entry] of this.entries) {
      if (entry.finishedAt !== null) {
        if (now - entry.finishedAt >= this.options.terminalStatusTtlMs) {
          this.entries.delete(sessionId);
          evicted.push(sessionId);
        }
        continue;
      }

      if (now - entry.startedAt >= this.options.staleProcessingMs) {
        entry.controller.abort();
        this.entries.delete(sessionId);
        evicted.push(sessionId);
        this.logger.warn(`aborted stale request session=${sessionId}`);
      }
    }

    if (evicted.length) this.logger.debug(`sweep evicted ${evicted.length} status entr(ies)`);
    return evicted;
  }

  private finish(
    sessionId: string,
    entry: Entry,
    status: Omit<RequestStatus, 'timestamp'>,
  ): boolean {
    if (this.entries.get(sessionId) !== entry) {
      this.logger.debug(`dropping late ${status.status} result for session=${sessionId}`);
      return false;
    }

    const finishedAt = this.now();
    entry.status = { ...status, timestamp: nowSeconds(finishedAt) };
    entry.finishedAt = finishedAt;
    return true;
  }
}
