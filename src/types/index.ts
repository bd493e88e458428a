import type { LogFormat, LogLevel } from "../utils/logger";

export const SUPPORTED_LANGUAGES = [
  "en",
  "zh",
  "ja",
  "ko",
  "fr",
  "de",
  "es",
  "ru",
] as const;

export type SupportedLanguage = (typeof SUPPORTED_LANGUAGES)[number];

export type LanguageTag = SupportedLanguage | "unknown";

export type MessageCategory = "chat" | "system" | "info" | "noise";

export type ChatChannel = "public" | "team" | "private" | "guild" | "system";

export interface FilterOptions {
  /** Master filter switch. When off, every non-empty line is kept. */
  readonly enabled: boolean;
  readonly keepSystem: boolean;
  readonly keepRewards: boolean;
  /** Display mode: report info and noise lines to the sink as well. */
  readonly showAll: boolean;
}

export interface MonitorConfig {
  pollIntervalMs: number;
  dedupeCapacity: number;
  maxRetries: number;
  retryBaseMs: number;
  retryMaxMs: number;
  fromBeginning: boolean;
  followNewFiles: boolean;
}

export interface DispatcherConfig {
  queueCapacity: number;
  debounceMs: number;
  cacheSize: number;
  stopTimeoutMs: number;
}

export interface Config {
  // Log discovery
  logPaths: string[];

  // Translation
  targetLanguage: string;
  engine: string;
  autoTranslate: boolean;
  autoDetect: boolean;
  noTranslateNames: boolean;

  filter: FilterOptions;
  monitor: MonitorConfig;
  dispatcher: DispatcherConfig;

  // Output settings
  logLevel: LogLevel;
  logFormat: LogFormat;
}
