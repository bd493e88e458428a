import { EventEmitter } from "events";
import { Config, FilterOptions, LanguageTag, MessageCategory } from "../types";
import { defaultLogger, LoggerLike } from "../utils/logger";
import { LogSourceError, toError } from "../utils/errors";
import { TranslationEngine } from "../providers/base-provider";
import { PassthroughEngine } from "../providers/passthrough";
import { ClassifiedMessage, LineClassifier } from "./line-classifier";
import { LanguageDetector } from "./language-detector";
import { LogMonitor, RawLine } from "./log-monitor";
import { TranslationCache } from "./translation-cache";
import {
  DispatchResult,
  DropReason,
  DispatchItem,
  EnqueueResult,
  TranslationDispatcher,
} from "./dispatcher";
import { StatsSnapshot } from "./stats";

/**
 * Receives every accepted line: kept lines, or every line in show-all mode.
 */
export type ClassifiedSink = (
  text: string,
  category: MessageCategory,
  rawLine: string,
  keepForTranslation: boolean
) => void;

export interface ChatTranslatorOptions {
  engines?: TranslationEngine[];
  sink?: ClassifiedSink;
  logger?: LoggerLike;
  monitor?: LogMonitor;
  dispatcher?: TranslationDispatcher;
  detector?: LanguageDetector;
  now?: () => number;
}

export interface SkippedEvent {
  text: string;
  language: LanguageTag;
  targetLanguage: string;
}

export type OfferResult = EnqueueResult | "skipped" | "disabled" | "empty";

export interface ChatTranslatorStatus {
  isRunning: boolean;
  logFile: string | null;
  pending: number;
  engine: string;
  targetLanguage: string;
  filter: FilterOptions;
  stats: StatsSnapshot;
  cache: ReturnType<TranslationCache["getStats"]>;
}

/**
 * One translation session: tails the chat log, classifies each line and
 * feeds eligible messages to the dispatcher.
 *
 * Events: `started`, `stopped`, `message` (ClassifiedMessage), `translation`
 * (DispatchResult), `dropped` ({ item, reason }), `skipped` (SkippedEvent),
 * `error` (Error).
 */
export class ChatTranslator extends EventEmitter {
  private config: Config;
  private logger: LoggerLike;
  private classifier: LineClassifier;
  private detector: LanguageDetector;
  private monitor: LogMonitor;
  private dispatcher: TranslationDispatcher;
  private sink: ClassifiedSink | undefined;
  private now: () => number;
  private isRunning = false;

  constructor(config: Config, options: ChatTranslatorOptions = {}) {
    super();
    this.config = config;
    this.logger = options.logger ?? defaultLogger.child("chat-translator");
    this.sink = options.sink;
    this.now = options.now ?? Date.now;

    this.classifier = new LineClassifier(config.filter);
    this.detector = options.detector ?? new LanguageDetector();

    this.monitor =
      options.monitor ??
      new LogMonitor({
        ...config.monitor,
        logPaths: config.logPaths,
        stopTimeoutMs: config.dispatcher.stopTimeoutMs,
        ...(options.logger ? { logger: options.logger } : {}),
      });

    this.dispatcher =
      options.dispatcher ??
      new TranslationDispatcher(
        options.engines ?? [new PassthroughEngine()],
        {
          queueCapacity: config.dispatcher.queueCapacity,
          debounceMs: config.dispatcher.debounceMs,
          stopTimeoutMs: config.dispatcher.stopTimeoutMs,
          cache: new TranslationCache({
            maxEntries: config.dispatcher.cacheSize,
          }),
          now: this.now,
          ...(options.logger ? { logger: options.logger } : {}),
        }
      );

    this.setupEventListeners();
  }

  /**
   * Select the chat log if none is selected yet, then start the dispatcher
   * worker and the tailer.
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      throw new Error("Chat translator is already running");
    }

    if (!this.monitor.getLogFile() && !(await this.monitor.findLogFile())) {
      throw new LogSourceError(
        "LOG_FILE_NOT_FOUND",
        "No chat log found; pass a log path or check the client's log directory"
      );
    }

    if (!this.dispatcher.getEngineIds().includes(this.config.engine)) {
      this.logger.warn("Configured engine is not registered", {
        engine: this.config.engine,
        registered: this.dispatcher.getEngineIds(),
      });
    }

    this.dispatcher.start();
    const started = await this.monitor.start();
    if (!started) {
      await this.dispatcher.stop();
      throw new LogSourceError(
        "LOG_FILE_NOT_FOUND",
        "Chat log could not be opened",
        this.monitor.getLogFile() ?? undefined
      );
    }

    this.isRunning = true;
    this.notify("started", { logFile: this.monitor.getLogFile() });
    this.logger.info("Chat translator started", {
      logFile: this.monitor.getLogFile(),
      engine: this.config.engine,
      targetLanguage: this.config.targetLanguage,
    });
  }

  async stop(): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    this.isRunning = false;
    try {
      await this.monitor.stop();
    } finally {
      await this.dispatcher.stop();
    }
    this.notify("stopped", undefined);
    this.logger.info("Chat translator stopped");
  }

  isActive(): boolean {
    return this.isRunning;
  }

  /**
   * Classify one raw line, report it and offer it for translation.
   */
  handleLine(raw: string): ClassifiedMessage {
    const message = this.classifier.classify(raw);

    if (message.text && (message.keep || this.classifier.options.showAll)) {
      this.deliver(message);
    }
    this.notify("message", message);

    if (message.keep) {
      this.offer(message);
    }
    return message;
  }

  /**
   * Hand a kept message to the dispatcher, unless auto-translate is off or
   * the text is already in the target language.
   */
  offer(message: ClassifiedMessage): OfferResult {
    if (!this.config.autoTranslate) {
      return "disabled";
    }

    const text =
      this.config.noTranslateNames && message.speaker
        ? message.message
        : message.text;
    if (!text.trim()) {
      return "empty";
    }

    const language = this.detector.detect(text);
    if (
      this.config.autoDetect &&
      !this.detector.shouldTranslate(text, this.config.targetLanguage)
    ) {
      const skipped: SkippedEvent = {
        text,
        language,
        targetLanguage: this.config.targetLanguage,
      };
      this.notify("skipped", skipped);
      return "skipped";
    }

    return this.dispatcher.enqueue({
      text,
      detectedLanguage: language,
      targetLanguage: this.config.targetLanguage,
      engine: this.config.engine,
      speaker: message.speaker,
      rawLine: message.raw,
    });
  }

  /**
   * Translate a piece of text right away, outside the queue. Uses the same
   * cache, engines and statistics as queued items.
   */
  async translateText(
    text: string,
    targetLanguage: string = this.config.targetLanguage
  ): Promise<DispatchResult> {
    const item: DispatchItem = {
      text: text.trim(),
      detectedLanguage: this.detector.detect(text),
      targetLanguage,
      engine: this.config.engine,
      rawLine: text,
      enqueuedAt: this.now(),
    };
    const result = await this.dispatcher.resolve(item);
    this.notify("translation", result);
    return result;
  }

  setFilterOptions(patch: Partial<FilterOptions>): FilterOptions {
    this.classifier = this.classifier.withOptions(patch);
    this.logger.debug("Filter options changed", { ...this.classifier.options });
    return this.classifier.options;
  }

  setSink(sink: ClassifiedSink | undefined): void {
    this.sink = sink;
  }

  getClassifier(): LineClassifier {
    return this.classifier;
  }

  getDetector(): LanguageDetector {
    return this.detector;
  }

  getMonitor(): LogMonitor {
    return this.monitor;
  }

  getDispatcher(): TranslationDispatcher {
    return this.dispatcher;
  }

  snapshotStats(): StatsSnapshot {
    return this.dispatcher.snapshotStats();
  }

  getStatus(): ChatTranslatorStatus {
    return {
      isRunning: this.isRunning,
      logFile: this.monitor.getLogFile(),
      pending: this.dispatcher.pending,
      engine: this.config.engine,
      targetLanguage: this.config.targetLanguage,
      filter: this.classifier.options,
      stats: this.dispatcher.snapshotStats(),
      cache: this.dispatcher.getCache().getStats(),
    };
  }

  private deliver(message: ClassifiedMessage): void {
    if (!this.sink) {
      return;
    }
    try {
      this.sink(message.text, message.category, message.raw, message.keep);
    } catch (error) {
      this.logger.error("Sink callback failed", toError(error), {
        category: message.category,
      });
    }
  }

  /**
   * Emit without letting a throwing listener interrupt line handling.
   */
  private notify(event: string, payload: unknown): void {
    try {
      this.emit(event, payload);
    } catch (error) {
      this.logger.error(`Chat translator '${event}' listener failed`, toError(error));
    }
  }

  private setupEventListeners(): void {
    this.monitor.on("line", (line: RawLine) => {
      this.handleLine(line.text);
    });

    // The monitor only emits errors it has given up on, so the session ends.
    this.monitor.on("error", (error: Error) => {
      this.logger.error("Log monitor error", error);
      this.stop().catch((stopError: unknown) => {
        this.logger.error("Chat translator did not stop cleanly", toError(stopError));
      });
      if (this.listenerCount("error") > 0) {
        this.notify("error", error);
      }
    });

    this.dispatcher.on("result", (result: DispatchResult) => {
      this.notify("translation", result);
    });

    this.dispatcher.on(
      "dropped",
      (event: { item: DispatchItem; reason: DropReason }) => {
        this.notify("dropped", event);
      }
    );
  }
}

export default ChatTranslator;
