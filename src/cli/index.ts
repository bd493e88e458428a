#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import fs from 'fs/promises';
import path from 'path';
import packageJson from '../../package.json';

import {
  ChatTranslator,
  ClassifiedMessage,
  ConfigPatch,
  ConfigValidator,
  DispatchResult,
  LanguageDetector,
  LineClassifier,
  LogLevel,
  LogMonitor,
  Logger,
  MessageCategory,
  StatsSnapshot,
  createDefaultConfig,
  deepMerge,
  defaultLogger,
  detectConfigFormat,
  loadConfig,
  mergeConfig,
  parseConfigContent,
  Config,
  FilterOptions,
  toError,
} from '../index';

export interface WatchOptions {
  config?: string;
  log?: string[];
  target?: string;
  engine?: string;
  showAll?: boolean;
  filter?: boolean;
  keepSystem?: boolean;
  keepRewards?: boolean;
  fromBeginning?: boolean;
  logLevel?: LogLevel;
}

interface FindLogOptions {
  config?: string;
  log?: string[];
}

interface AnalyzeOptions {
  config?: string;
  lines: string;
  showAll?: boolean;
  keepSystem?: boolean;
  keepRewards?: boolean;
}

interface DetectOptions {
  target?: string;
  verbose?: boolean;
}

interface ValidateOptions {
  config: string;
}

/**
 * Turn command-line flags into a config patch. Flags that were not given
 * leave the configured value alone.
 */
export function optionsToPatch(options: WatchOptions): ConfigPatch {
  const patch: ConfigPatch = {};
  const filter: Partial<FilterOptions> = {
    ...(options.filter === false ? { enabled: false } : {}),
    ...(options.showAll ? { showAll: true } : {}),
    ...(options.keepSystem ? { keepSystem: true } : {}),
    ...(options.keepRewards ? { keepRewards: true } : {}),
  };

  if (options.log && options.log.length > 0) {
    patch.logPaths = options.log;
  }
  if (options.target) {
    patch.targetLanguage = options.target;
  }
  if (options.engine) {
    patch.engine = options.engine;
  }
  if (options.logLevel) {
    patch.logLevel = options.logLevel;
  }
  if (Object.keys(filter).length > 0) {
    patch.filter = filter;
  }
  if (options.fromBeginning) {
    patch.monitor = { fromBeginning: true };
  }

  return patch;
}

export function formatAnalysisRow(
  message: ClassifiedMessage,
  language: string
): string {
  const speaker = message.speaker ? `<${message.speaker}> ` : '';
  return [
    message.category.padEnd(6),
    (message.channel ?? '-').padEnd(7),
    language.padEnd(7),
    `${speaker}${message.message}`,
  ].join(' ');
}

export function formatStats(stats: StatsSnapshot): string[] {
  const lines = [
    `Total: ${stats.total}  Success: ${stats.success}  Failed: ${stats.fail}  Cache hits: ${stats.cacheHit}`,
    `Avg latency: ${stats.avgLatencyMs.toFixed(1)}ms  Hit rate: ${stats.hitRate.toFixed(1)}%  Fail rate: ${stats.failRate.toFixed(1)}%`,
  ];
  for (const [engine, counters] of Object.entries(stats.byEngine)) {
    lines.push(
      `  ${engine}: ${counters.total} total, ${counters.success} ok, ${counters.fail} failed, ${counters.cacheHit} cached`
    );
  }
  return lines;
}

const CATEGORY_STYLES: Record<MessageCategory, (text: string) => string> = {
  chat: text => chalk.white(text),
  system: text => chalk.yellow(text),
  info: text => chalk.gray(text),
  noise: text => chalk.dim(text),
};

class ChatLogCLI {
  private program: Command;
  private logger: Logger;
  private configValidator: ConfigValidator;
  private session: ChatTranslator | null = null;

  constructor() {
    this.program = new Command();
    this.logger = defaultLogger;
    this.configValidator = new ConfigValidator();
    this.setupCommands();
  }

  private setupCommands(): void {
    this.program
      .name('chatlog-translator')
      .description('Tail a game chat log and translate what players say')
      .version(packageJson.version);

    this.program
      .command('watch')
      .description('Tail the chat log and translate chat as it arrives')
      .option('-c, --config <path>', 'Path to a JSON or YAML configuration file')
      .option('--log <paths...>', 'Log files or directories to search first')
      .option('-t, --target <language>', 'Target language code (e.g., zh-CN)')
      .option('-e, --engine <id>', 'Translation engine id')
      .option('--show-all', 'Print every line, not only kept ones')
      .option('--no-filter', 'Disable the noise filter')
      .option('--keep-system', 'Keep join, leave and advancement messages')
      .option('--keep-rewards', 'Keep reward and experience messages')
      .option('--from-beginning', 'Read the whole log instead of only new lines')
      .option('--log-level <level>', 'Log level (debug, info, warn, error)')
      .action(async (options: WatchOptions) => {
        await this.watchCommand(options);
      });

    this.program
      .command('find-log')
      .description('Print the chat log that would be tailed')
      .option('-c, --config <path>', 'Path to configuration file')
      .option('--log <paths...>', 'Log files or directories to search first')
      .action(async (options: FindLogOptions) => {
        await this.findLogCommand(options);
      });

    this.program
      .command('analyze')
      .description('Classify the last lines of a chat log')
      .argument('[file]', 'Log file to analyze (defaults to the detected log)')
      .option('-c, --config <path>', 'Path to configuration file')
      .option('-n, --lines <count>', 'Number of lines to analyze', '50')
      .option('--show-all', 'Include lines the filter would drop')
      .option('--keep-system', 'Keep join, leave and advancement messages')
      .option('--keep-rewards', 'Keep reward and experience messages')
      .action(async (file: string | undefined, options: AnalyzeOptions) => {
        await this.analyzeCommand(file, options);
      });

    this.program
      .command('detect')
      .description('Detect the language of a piece of text')
      .argument('<text...>', 'Text to inspect')
      .option('-t, --target <language>', 'Target language code')
      .option('-v, --verbose', 'Show per-language scores')
      .action((words: string[], options: DetectOptions) => {
        this.detectCommand(words.join(' '), options);
      });

    this.program
      .command('rules')
      .description('Print the effective filter rules')
      .option('--no-filter', 'Show rules with the noise filter disabled')
      .option('--keep-system', 'Keep join, leave and advancement messages')
      .option('--keep-rewards', 'Keep reward and experience messages')
      .action((options: WatchOptions) => {
        this.rulesCommand(options);
      });

    this.program
      .command('validate')
      .description('Validate configuration file')
      .requiredOption('-c, --config <path>', 'Path to configuration file')
      .action(async (options: ValidateOptions) => {
        await this.validateCommand(options);
      });
  }

  private async watchCommand(options: WatchOptions): Promise<void> {
    try {
      const base = await this.loadBaseConfig(options.config);
      const config = mergeConfig(base, optionsToPatch(options));

      const validation = this.configValidator.validateConfig(config);
      if (!validation.isValid) {
        this.logger.error('Configuration validation failed');
        console.log(this.configValidator.generateValidationReport(validation));
        process.exit(1);
      }

      this.logger.setLevel(config.logLevel);
      this.logger.setFormat(config.logFormat);

      const session = new ChatTranslator(config, {
        sink: (text, category) => this.printLine(text, category),
      });
      this.session = session;

      session.on('translation', (result: DispatchResult) => {
        this.printTranslation(result);
      });
      session.on('error', (error: Error) => {
        this.logger.error('Chat log monitoring stopped', error);
        this.shutdown('error', 1).catch(shutdownError =>
          this.logger.error('Shutdown failed', toError(shutdownError))
        );
      });

      await session.start();

      const status = session.getStatus();
      this.logger.info(`Watching: ${status.logFile ?? '(none)'}`);
      this.logger.info(`Target language: ${config.targetLanguage}`);
      this.logger.info(`Engine: ${config.engine}`);

      for (const signal of ['SIGINT', 'SIGTERM'] as const) {
        process.once(signal, () => {
          this.logger.info(`Received ${signal}, shutting down...`);
          this.shutdown(signal, 0).catch(error =>
            this.logger.error('Shutdown failed', toError(error))
          );
        });
      }
    } catch (error) {
      this.logger.error('Failed to start chat translator', toError(error));
      process.exit(1);
    }
  }

  private async findLogCommand(options: FindLogOptions): Promise<void> {
    try {
      const config = await this.loadBaseConfig(options.config);
      const monitor = new LogMonitor({
        logPaths: options.log ?? config.logPaths,
        logger: this.logger.child('find-log'),
      });

      if (!(await monitor.findLogFile())) {
        console.log(chalk.red('No chat log found'));
        process.exit(1);
      }
      console.log(monitor.getLogFile());
    } catch (error) {
      this.logger.error('Failed to find chat log', toError(error));
      process.exit(1);
    }
  }

  private async analyzeCommand(
    file: string | undefined,
    options: AnalyzeOptions
  ): Promise<void> {
    try {
      const config = await this.loadBaseConfig(options.config);
      const monitor = new LogMonitor({
        logPaths: config.logPaths,
        logger: this.logger.child('analyze'),
      });

      if (file) {
        monitor.setLogFile(file);
      } else if (!(await monitor.findLogFile())) {
        console.log(chalk.red('No chat log found'));
        process.exit(1);
      }

      const count = Number.parseInt(options.lines, 10);
      const lines = await monitor.tail(Number.isNaN(count) ? 50 : count);
      const classifier = new LineClassifier({
        ...config.filter,
        ...(options.keepSystem ? { keepSystem: true } : {}),
        ...(options.keepRewards ? { keepRewards: true } : {}),
      });
      const detector = new LanguageDetector();
      const tally: Record<MessageCategory, number> = {
        chat: 0,
        system: 0,
        info: 0,
        noise: 0,
      };

      console.log(chalk.blue(`Analyzing ${monitor.getLogFile()}`));
      for (const line of lines) {
        const message = classifier.classify(line);
        if (!message.text) {
          continue;
        }
        tally[message.category]++;
        if (!message.keep && !options.showAll) {
          continue;
        }
        const row = formatAnalysisRow(message, detector.detect(message.message));
        console.log(CATEGORY_STYLES[message.category](row));
      }

      console.log(
        chalk.blue(
          `chat: ${tally.chat}, system: ${tally.system}, info: ${tally.info}, noise: ${tally.noise}`
        )
      );
    } catch (error) {
      this.logger.error('Failed to analyze chat log', toError(error));
      process.exit(1);
    }
  }

  private detectCommand(text: string, options: DetectOptions): void {
    const detector = new LanguageDetector();
    const analysis = detector.analyze(text);

    console.log(`Language: ${chalk.green(analysis.language)}`);
    if (options.target) {
      const translate = detector.shouldTranslate(text, options.target);
      console.log(
        `Translate to ${options.target}: ${
          translate ? chalk.yellow('yes') : chalk.gray('no')
        }`
      );
    }

    if (options.verbose) {
      if (analysis.hanShortcut) {
        console.log(chalk.gray('Han characters present; classified as Chinese'));
      }
      for (const [language, score] of Object.entries(analysis.scores)) {
        console.log(chalk.gray(`  ${language}: ${score}`));
      }
    }
  }

  private rulesCommand(options: WatchOptions): void {
    const classifier = new LineClassifier({
      enabled: options.filter !== false,
      keepSystem: options.keepSystem ?? false,
      keepRewards: options.keepRewards ?? false,
    });
    const rules = classifier.describeRules();

    const sections: Array<[string, string[]]> = [
      ['Drop rules', rules.drop],
      ['System rules', rules.system],
      ['Chat shapes', rules.chat],
      ['Channels (by priority)', rules.channels],
    ];
    for (const [title, entries] of sections) {
      console.log(chalk.blue(title));
      if (entries.length === 0) {
        console.log(chalk.gray('  (inactive)'));
      }
      entries.forEach((entry, index) => {
        console.log(`  ${index + 1}. ${entry}`);
      });
    }
  }

  private async validateCommand(options: ValidateOptions): Promise<void> {
    try {
      const configPath = path.resolve(options.config);
      this.logger.info(`Validating configuration: ${configPath}`);

      const content = await fs.readFile(configPath, 'utf-8');
      const parsed = parseConfigContent(content, detectConfigFormat(configPath));
      const config = deepMerge(createDefaultConfig(), parsed);

      const validation = this.configValidator.validateConfig(config);
      console.log(this.configValidator.generateValidationReport(validation));

      if (validation.isValid) {
        this.logger.info('✅ Configuration is valid!');
        process.exit(0);
      } else {
        this.logger.error('❌ Configuration has errors');
        process.exit(1);
      }
    } catch (error) {
      this.logger.error('Failed to validate configuration', toError(error));
      process.exit(1);
    }
  }

  private async loadBaseConfig(configPath: string | undefined): Promise<Config> {
    if (!configPath) {
      return createDefaultConfig();
    }

    const loaded = await loadConfig(configPath, this.configValidator);
    if (loaded.validation.warnings.length > 0) {
      this.logger.warn('Configuration warnings detected');
      loaded.validation.warnings.forEach(warning => this.logger.warn(warning));
    }
    return loaded.config;
  }

  private printLine(text: string, category: MessageCategory): void {
    console.log(CATEGORY_STYLES[category](text));
  }

  private printTranslation(result: DispatchResult): void {
    if (result.translatedText !== null) {
      const marker = result.cacheHit ? chalk.gray(' (cached)') : '';
      console.log(chalk.cyan(`  -> ${result.translatedText}`) + marker);
    } else {
      console.log(chalk.red(`  !! ${result.error ?? 'Translation failed'}`));
    }
  }

  private async shutdown(reason: string, exitCode: number): Promise<void> {
    const session = this.session;
    this.session = null;
    if (session) {
      await session.stop();
      console.log(chalk.blue(`Translation statistics (${reason})`));
      formatStats(session.snapshotStats()).forEach(line => console.log(line));
    }
    await this.logger.flush();
    process.exit(exitCode);
  }

  public async run(argv: string[] = process.argv): Promise<void> {
    await this.program.parseAsync(argv);
  }
}

// Export the CLI class for programmatic use
export { ChatLogCLI };

if (require.main === module) {
  new ChatLogCLI().run().catch(error => {
    defaultLogger.error('Command failed', toError(error));
    process.exitCode = 1;
  });
}
