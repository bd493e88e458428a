import { EventEmitter } from 'events';
import { LanguageTag } from '../types';
import {
  EngineResult,
  TranslationEngine,
  engineFailure,
} from '../providers/base-provider';
import { TranslationCache } from './translation-cache';
import { StatsCollector, StatsSnapshot } from './stats';
import { defaultLogger, LoggerLike } from '../utils/logger';
import { errorMessage, toError } from '../utils/errors';

export interface DispatchItem {
  text: string;
  detectedLanguage: LanguageTag;
  targetLanguage: string;
  engine: string;
  speaker?: string;
  rawLine: string;
  enqueuedAt: number;
}

export type DispatchRequest = Omit<DispatchItem, 'enqueuedAt'> &
  Partial<Pick<DispatchItem, 'enqueuedAt'>>;

export type EnqueueResult = 'accepted' | 'debounced' | 'queue-full' | 'stopped';

export type DropReason = Exclude<EnqueueResult, 'accepted'>;

export type DispatchStatus = 'cache-resolved' | 'succeeded' | 'failed';

export interface DispatchResult {
  item: DispatchItem;
  status: DispatchStatus;
  translatedText: string | null;
  error: string | null;
  cacheHit: boolean;
  sourceLanguage: string;
  durationMs: number;
}

export interface DispatcherOptions {
  queueCapacity?: number;
  debounceMs?: number;
  stopTimeoutMs?: number;
  cache?: TranslationCache;
  stats?: StatsCollector;
  logger?: LoggerLike;
  now?: () => number;
}

const STOP: unique symbol = Symbol('dispatcher-stop');

type QueueEntry = DispatchItem | typeof STOP;

/**
 * Single-worker translation queue.
 *
 * Two independent shedding policies guard the queue: an item identical to the
 * last accepted one within `debounceMs` is suppressed, and an item arriving
 * while `queueCapacity` items are waiting is dropped. Neither blocks the
 * caller.
 *
 * Events: `result` (DispatchResult), `dropped` ({ item, reason }), `started`,
 * `stopped`.
 */
export class TranslationDispatcher extends EventEmitter {
  private readonly engines: Map<string, TranslationEngine> = new Map();
  private readonly cache: TranslationCache;
  private readonly stats: StatsCollector;
  private readonly logger: LoggerLike;
  private readonly now: () => number;
  private readonly queueCapacity: number;
  private readonly debounceMs: number;
  private readonly stopTimeoutMs: number;

  private queue: QueueEntry[] = [];
  private wake: (() => void) | null = null;
  private worker: Promise<void> | null = null;
  private stopping = false;
  private restartPending = false;
  private busy = false;
  private lastAccepted: { text: string; at: number } | null = null;
  private idleWaiters: Array<() => void> = [];

  constructor(engines: TranslationEngine[] = [], options: DispatcherOptions = {}) {
    super();
    this.queueCapacity = Math.max(1, options.queueCapacity ?? 5);
    this.debounceMs = Math.max(0, options.debounceMs ?? 1000);
    this.stopTimeoutMs = Math.max(0, options.stopTimeoutMs ?? 1000);
    this.cache = options.cache ?? new TranslationCache();
    this.stats = options.stats ?? new StatsCollector();
    this.logger = options.logger ?? defaultLogger.child('dispatcher');
    this.now = options.now ?? Date.now;

    for (const engine of engines) {
      this.registerEngine(engine);
    }
  }

  registerEngine(engine: TranslationEngine): void {
    this.engines.set(engine.id, engine);
  }

  getEngineIds(): string[] {
    return [...this.engines.keys()];
  }

  getCache(): TranslationCache {
    return this.cache;
  }

  /**
   * Offer an item to the queue. Never waits: the item is accepted, or it is
   * shed and the reason is returned.
   */
  enqueue(request: DispatchRequest): EnqueueResult {
    const now = this.now();
    const item: DispatchItem = { ...request, enqueuedAt: request.enqueuedAt ?? now };

    if (this.stopping) {
      return this.drop(item, 'stopped');
    }

    if (
      this.lastAccepted &&
      this.lastAccepted.text === item.text &&
      now - this.lastAccepted.at < this.debounceMs
    ) {
      return this.drop(item, 'debounced');
    }

    if (this.queue.length >= this.queueCapacity) {
      return this.drop(item, 'queue-full');
    }

    this.queue.push(item);
    this.lastAccepted = { text: item.text, at: now };
    this.signal();
    return 'accepted';
  }

  get pending(): number {
    return this.queue.filter(entry => entry !== STOP).length;
  }

  isRunning(): boolean {
    return this.worker !== null && !this.stopping;
  }

  /**
   * Start the worker. Called while a stop is still pending, it cancels the
   * stop and keeps the current worker, or starts a new one as soon as the
   * current worker has exited.
   */
  start(): void {
    if (this.worker) {
      if (this.stopping) {
        this.cancelStop();
      }
      return;
    }

    this.worker = this.run().finally(() => {
      this.worker = null;
      this.stopping = false;
      if (this.restartPending) {
        this.restartPending = false;
        this.start();
      } else {
        this.notifyIdle();
      }
    });
    this.emit('started');
  }

  /**
   * Let the worker finish what is queued, then exit. Waits at most
   * `stopTimeoutMs`; a worker still inside an engine call exits on its own
   * once that call completes.
   */
  async stop(): Promise<void> {
    const worker = this.worker;
    if (!worker || this.stopping) {
      return;
    }

    this.stopping = true;
    this.queue.push(STOP);
    this.signal();

    let timer: NodeJS.Timeout | undefined;
    const timedOut = await Promise.race([
      worker.then(() => false),
      new Promise<boolean>(resolve => {
        timer = setTimeout(() => resolve(true), this.stopTimeoutMs);
      }),
    ]);
    clearTimeout(timer);

    if (!this.stopping && this.worker === worker) {
      // Restarted while waiting.
      return;
    }
    if (timedOut) {
      this.logger.warn('Dispatcher worker did not stop in time', {
        pending: this.pending,
        timeoutMs: this.stopTimeoutMs,
      });
    }
    this.emit('stopped');
  }

  /**
   * Resolves once the queue is empty and no item is in flight.
   */
  onIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise(resolve => this.idleWaiters.push(resolve));
  }

  /**
   * Translate one item through the cache and engines and record the attempt.
   * Used by the worker and for one-off manual translations.
   */
  async resolve(item: DispatchItem): Promise<DispatchResult> {
    const sourceLanguage =
      item.detectedLanguage === 'unknown' ? 'auto' : item.detectedLanguage;

    const cached = this.cache.get(item.text, item.engine, item.targetLanguage);
    if (cached !== undefined) {
      this.stats.record({
        engine: item.engine,
        success: true,
        cacheHit: true,
        durationMs: 0,
      });
      return {
        item,
        status: 'cache-resolved',
        translatedText: cached,
        error: null,
        cacheHit: true,
        sourceLanguage,
        durationMs: 0,
      };
    }

    const startedAt = this.now();
    const outcome = await this.callEngine(item, sourceLanguage);
    const durationMs = Math.max(0, this.now() - startedAt);
    const succeeded = outcome.error === null && Boolean(outcome.text);

    if (succeeded && outcome.text) {
      this.cache.set(
        item.text,
        item.engine,
        item.targetLanguage,
        outcome.text
      );
    }

    this.stats.record({
      engine: item.engine,
      success: succeeded,
      cacheHit: false,
      durationMs,
    });

    return {
      item,
      status: succeeded ? 'succeeded' : 'failed',
      translatedText: succeeded ? outcome.text : null,
      error: succeeded ? null : outcome.error ?? 'Engine returned no text',
      cacheHit: false,
      sourceLanguage,
      durationMs,
    };
  }

  snapshotStats(): StatsSnapshot {
    return this.stats.snapshot();
  }

  resetStats(): void {
    this.stats.reset();
  }

  private async callEngine(
    item: DispatchItem,
    sourceLanguage: string
  ): Promise<EngineResult> {
    const engine = this.engines.get(item.engine);
    if (!engine) {
      return engineFailure(`Unknown translation engine: ${item.engine}`);
    }

    try {
      return await engine.translate(
        item.text,
        sourceLanguage,
        item.targetLanguage
      );
    } catch (error) {
      return engineFailure(errorMessage(error));
    }
  }

  private async run(): Promise<void> {
    for (;;) {
      const entry = await this.take();
      if (entry === STOP) {
        return;
      }

      try {
        const result = await this.resolve(entry);
        if (result.status === 'failed') {
          this.logger.warn('Translation failed', {
            engine: entry.engine,
            error: result.error,
          });
        }
        this.emit('result', result);
      } catch (error) {
        this.logger.error('Dispatch worker error', toError(error), {
          engine: entry.engine,
        });
      } finally {
        this.busy = false;
        this.notifyIdle();
      }
    }
  }

  private async take(): Promise<QueueEntry> {
    let entry = this.queue.shift();
    while (entry === undefined) {
      await new Promise<void>(resolve => {
        this.wake = resolve;
      });
      entry = this.queue.shift();
    }
    // Marked busy before yielding, so onIdle() never sees a taken item as done.
    if (entry !== STOP) {
      this.busy = true;
    }
    return entry;
  }

  private cancelStop(): void {
    const queued = this.queue.length;
    this.queue = this.queue.filter(entry => entry !== STOP);
    this.stopping = false;
    this.logger.info('Dispatcher stop cancelled by start', {
      pending: this.pending,
    });
    if (this.queue.length === queued) {
      // The worker already took the sentinel; the next one emits `started`.
      this.restartPending = true;
      return;
    }
    this.emit('started');
  }

  private signal(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private drop(item: DispatchItem, reason: DropReason): DropReason {
    this.logger.debug('Dispatch item dropped', { reason, engine: item.engine });
    this.emit('dropped', { item, reason });
    return reason;
  }

  private isIdle(): boolean {
    return !this.busy && this.pending === 0;
  }

  private notifyIdle(): void {
    if (!this.isIdle() && this.worker) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach(resolve => resolve());
  }
}

export default TranslationDispatcher;
