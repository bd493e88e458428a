// Main entry point for the chat log translator package
export {
  ChatTranslator,
  type ChatTranslatorOptions,
  type ChatTranslatorStatus,
  type ClassifiedSink,
  type OfferResult,
  type SkippedEvent,
} from "./core/chat-translator";

export {
  SUPPORTED_LANGUAGES,
  type Config,
  type ChatChannel,
  type DispatcherConfig,
  type FilterOptions,
  type LanguageTag,
  type MessageCategory,
  type MonitorConfig,
  type SupportedLanguage,
} from "./types";

// Log source exports
export {
  LogMonitor,
  decodeLossy,
  type LogMonitorOptions,
  type LogPosition,
  type RawLine,
  type RetryEvent,
} from "./core/log-monitor";

export {
  collectLogCandidates,
  defaultLogPaths,
  findLatestLog,
  isLogCandidate,
  pickActiveLog,
  type LogCandidate,
} from "./core/log-locator";

export { RecentLineSet } from "./core/recent-lines";

// Classification exports
export {
  LineClassifier,
  CHANNEL_RULES,
  CHAT_SHAPES,
  DEFAULT_FILTER_OPTIONS,
  DROP_RULES,
  REWARD_RULES,
  SYSTEM_RULES,
  cleanMessage,
  detectChannel,
  extractMessage,
  isReservedSpeaker,
  type ChannelRuleGroup,
  type ChatShape,
  type ClassifiedMessage,
  type ExtractedMessage,
  type FilterRule,
  type RuleDescription,
} from "./core/line-classifier";

export {
  LanguageDetector,
  normalizeLanguage,
  type DetectionAnalysis,
} from "./core/language-detector";

// Dispatch exports
export {
  TranslationDispatcher,
  type DispatchItem,
  type DispatchRequest,
  type DispatchResult,
  type DispatchStatus,
  type DispatcherOptions,
  type DropReason,
  type EnqueueResult,
} from "./core/dispatcher";

export {
  TranslationCache,
  type CacheStats,
  type TranslationCacheOptions,
} from "./core/translation-cache";

export {
  StatsCollector,
  type AttemptRecord,
  type Counters,
  type CountersSnapshot,
  type StatsSnapshot,
} from "./core/stats";

// Utility exports
export {
  ConfigValidator,
  isRecord,
  type ValidationError,
  type ValidationResult,
  type ValidationRule,
  type ValidationSchema,
} from "./utils/config-validator";

export {
  DEFAULT_CONFIG,
  createDefaultConfig,
  deepMerge,
  detectConfigFormat,
  loadConfig,
  mergeConfig,
  parseConfigContent,
  type ConfigFormat,
  type ConfigPatch,
  type LoadedConfig,
} from "./utils/config-loader";

export {
  ConfigError,
  LogSourceError,
  errorMessage,
  toError,
  type ConfigErrorCode,
  type LogSourceErrorCode,
} from "./utils/errors";

export {
  Logger,
  ChildLogger,
  defaultLogger,
  type LogContext,
  type LogFormat,
  type LogLevel,
  type LogEntry,
  type LoggerLike,
  type LoggerOptions,
  type LogFormatter,
} from "./utils/logger";

// Engine exports
export {
  BaseTranslationEngine,
  engineFailure,
  engineSuccess,
  type EngineCapabilities,
  type EngineResult,
  type TranslationEngine,
} from "./providers/base-provider";

export {
  PassthroughEngine,
  type PassthroughOptions,
} from "./providers/passthrough";

// Default export for convenience
export { default } from "./core/chat-translator";
