import { Config } from '../types';
import { LoggerLike } from './logger';

export interface ValidationError {
  path: string;
  message: string;
  value?: unknown;
  expected?: string;
}

export interface ValidationResult {
  isValid: boolean;
  errors: ValidationError[];
  warnings: string[];
}

export interface ValidationRule {
  required?: boolean;
  type?: 'string' | 'number' | 'boolean' | 'array' | 'object';
  minLength?: number;
  maxLength?: number;
  minValue?: number;
  maxValue?: number;
  integer?: boolean;
  pattern?: RegExp;
  enum?: readonly unknown[];
  custom?: (value: unknown, path: string) => ValidationError | null;
}

/**
 * Rules keyed by dot path into the configuration, e.g. `filter.enabled`.
 */
export type ValidationSchema = Record<string, ValidationRule>;

const LANGUAGE_CODE = /^[a-z]{2,3}([-_][A-Za-z]{2,4})?$/;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readPath(data: Record<string, unknown>, dotted: string): unknown {
  let current: unknown = data;
  for (const part of dotted.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

function numberAt(data: Record<string, unknown>, dotted: string): number | undefined {
  const value = readPath(data, dotted);
  return typeof value === 'number' ? value : undefined;
}

export class ConfigValidator {
  private schema: ValidationSchema;
  private logger: LoggerLike | undefined;

  constructor(logger?: LoggerLike) {
    this.schema = this.buildDefaultSchema();
    this.logger = logger;
  }

  /**
   * Validate a configuration object
   */
  validateConfig(config: unknown): ValidationResult {
    const errors: ValidationError[] = [];
    const warnings: string[] = [];

    if (!isRecord(config)) {
      errors.push({
        path: 'root',
        message: 'Configuration must be an object',
        value: config,
        expected: 'object',
      });
      return { isValid: false, errors, warnings };
    }

    try {
      errors.push(...this.validateAgainstSchema(config));
      errors.push(...this.validateBusinessRules(config));
      warnings.push(...this.generateWarnings(config));
    } catch (error) {
      errors.push({
        path: 'root',
        message: `Validation failed with error: ${
          error instanceof Error ? error.message : String(error)
        }`,
      });
    }

    this.logger?.debug('Configuration validated', {
      errors: errors.length,
      warnings: warnings.length,
    });

    return {
      isValid: errors.length === 0,
      errors,
      warnings,
    };
  }

  /**
   * Narrow an unknown value to a Config, or report why it is not one.
   */
  isConfig(config: unknown): config is Config {
    return this.validateConfig(config).isValid;
  }

  private validateAgainstSchema(data: Record<string, unknown>): ValidationError[] {
    const errors: ValidationError[] = [];

    for (const [key, rule] of Object.entries(this.schema)) {
      const error = this.validateField(readPath(data, key), rule, key);
      if (error) {
        errors.push(error);
      }
    }

    return errors;
  }

  private validateField(
    value: unknown,
    rule: ValidationRule,
    path: string
  ): ValidationError | null {
    if (rule.required && (value === undefined || value === null)) {
      return {
        path,
        message: 'Required field is missing',
        expected: 'required value',
      };
    }

    if (value === undefined || value === null) {
      return null;
    }

    if (rule.type && !this.validateType(value, rule.type)) {
      return {
        path,
        message: `Expected type ${rule.type}, got ${
          Array.isArray(value) ? 'array' : typeof value
        }`,
        value,
        expected: rule.type,
      };
    }

    if (typeof value === 'string') {
      if (rule.minLength !== undefined && value.length < rule.minLength) {
        return {
          path,
          message: `String must be at least ${rule.minLength} characters long`,
          value,
          expected: `min length ${rule.minLength}`,
        };
      }

      if (rule.maxLength !== undefined && value.length > rule.maxLength) {
        return {
          path,
          message: `String must be at most ${rule.maxLength} characters long`,
          value,
          expected: `max length ${rule.maxLength}`,
        };
      }

      if (rule.pattern && !rule.pattern.test(value)) {
        return {
          path,
          message: 'String does not match required pattern',
          value,
          expected: `pattern ${rule.pattern}`,
        };
      }
    }

    if (typeof value === 'number') {
      if (rule.integer && !Number.isInteger(value)) {
        return {
          path,
          message: 'Value must be an integer',
          value,
          expected: 'integer',
        };
      }

      if (rule.minValue !== undefined && value < rule.minValue) {
        return {
          path,
          message: `Value must be at least ${rule.minValue}`,
          value,
          expected: `min value ${rule.minValue}`,
        };
      }

      if (rule.maxValue !== undefined && value > rule.maxValue) {
        return {
          path,
          message: `Value must be at most ${rule.maxValue}`,
          value,
          expected: `max value ${rule.maxValue}`,
        };
      }
    }

    if (Array.isArray(value)) {
      if (rule.minLength !== undefined && value.length < rule.minLength) {
        return {
          path,
          message: `Array must have at least ${rule.minLength} items`,
          value,
          expected: `min length ${rule.minLength}`,
        };
      }

      if (rule.maxLength !== undefined && value.length > rule.maxLength) {
        return {
          path,
          message: `Array must have at most ${rule.maxLength} items`,
          value,
          expected: `max length ${rule.maxLength}`,
        };
      }
    }

    if (rule.enum && !rule.enum.includes(value)) {
      return {
        path,
        message: `Value must be one of: ${rule.enum.join(', ')}`,
        value,
        expected: `enum values: ${rule.enum.join(', ')}`,
      };
    }

    if (rule.custom) {
      return rule.custom(value, path);
    }

    return null;
  }

  /**
   * Rules spanning several fields
   */
  private validateBusinessRules(config: Record<string, unknown>): ValidationError[] {
    const errors: ValidationError[] = [];

    const retryBase = numberAt(config, 'monitor.retryBaseMs');
    const retryMax = numberAt(config, 'monitor.retryMaxMs');
    if (retryBase !== undefined && retryMax !== undefined && retryBase > retryMax) {
      errors.push({
        path: 'monitor.retryMaxMs',
        message: 'Maximum retry delay must not be below the base delay',
        value: retryMax,
        expected: `>= ${retryBase}`,
      });
    }

    return errors;
  }

  /**
   * Settings that are valid but probably not what the user wants
   */
  private generateWarnings(config: Record<string, unknown>): string[] {
    const warnings: string[] = [];

    const pollInterval = numberAt(config, 'monitor.pollIntervalMs');
    if (pollInterval !== undefined && pollInterval < 100) {
      warnings.push(
        'Poll interval below 100ms re-reads the log file very often.'
      );
    }

    if (numberAt(config, 'dispatcher.debounceMs') === 0) {
      warnings.push(
        'Debounce is disabled; repeated messages will each be translated.'
      );
    }

    const queueCapacity = numberAt(config, 'dispatcher.queueCapacity');
    if (queueCapacity !== undefined && queueCapacity > 50) {
      warnings.push(
        'Large queue capacity lets translations lag far behind the chat.'
      );
    }

    if (
      readPath(config, 'filter.enabled') === false &&
      readPath(config, 'autoTranslate') === true
    ) {
      warnings.push(
        'Filtering is disabled while auto-translate is on; every log line will be sent to the engine.'
      );
    }

    return warnings;
  }

  private buildDefaultSchema(): ValidationSchema {
    return {
      logPaths: {
        required: true,
        type: 'array',
        maxLength: 50,
        custom: (value, path) => {
          if (
            Array.isArray(value) &&
            value.every(entry => typeof entry === 'string' && entry.length > 0)
          ) {
            return null;
          }
          return {
            path,
            message: 'Log paths must be non-empty strings',
            value,
            expected: 'string[]',
          };
        },
      },
      targetLanguage: {
        required: true,
        type: 'string',
        pattern: LANGUAGE_CODE,
      },
      engine: {
        required: true,
        type: 'string',
        minLength: 1,
      },
      autoTranslate: { required: true, type: 'boolean' },
      autoDetect: { required: true, type: 'boolean' },
      noTranslateNames: { required: true, type: 'boolean' },
      filter: { required: true, type: 'object' },
      'filter.enabled': { required: true, type: 'boolean' },
      'filter.keepSystem': { required: true, type: 'boolean' },
      'filter.keepRewards': { required: true, type: 'boolean' },
      'filter.showAll': { required: true, type: 'boolean' },
      monitor: { required: true, type: 'object' },
      'monitor.pollIntervalMs': {
        required: true,
        type: 'number',
        integer: true,
        minValue: 10,
        maxValue: 60000,
      },
      'monitor.dedupeCapacity': {
        required: true,
        type: 'number',
        integer: true,
        minValue: 1,
        maxValue: 100000,
      },
      'monitor.maxRetries': {
        required: true,
        type: 'number',
        integer: true,
        minValue: 0,
        maxValue: 100,
      },
      'monitor.retryBaseMs': {
        required: true,
        type: 'number',
        minValue: 1,
      },
      'monitor.retryMaxMs': {
        required: true,
        type: 'number',
        minValue: 1,
      },
      'monitor.fromBeginning': { required: true, type: 'boolean' },
      'monitor.followNewFiles': { required: true, type: 'boolean' },
      dispatcher: { required: true, type: 'object' },
      'dispatcher.queueCapacity': {
        required: true,
        type: 'number',
        integer: true,
        minValue: 1,
        maxValue: 1000,
      },
      'dispatcher.debounceMs': {
        required: true,
        type: 'number',
        minValue: 0,
      },
      'dispatcher.cacheSize': {
        required: true,
        type: 'number',
        integer: true,
        minValue: 0,
      },
      'dispatcher.stopTimeoutMs': {
        required: true,
        type: 'number',
        minValue: 0,
      },
      logLevel: {
        required: true,
        type: 'string',
        enum: ['debug', 'info', 'warn', 'error'],
      },
      logFormat: {
        required: true,
        type: 'string',
        enum: ['json', 'text', 'simple'],
      },
    };
  }

  private validateType(
    value: unknown,
    expectedType: NonNullable<ValidationRule['type']>
  ): boolean {
    switch (expectedType) {
      case 'string':
        return typeof value === 'string';
      case 'number':
        return typeof value === 'number' && !isNaN(value);
      case 'boolean':
        return typeof value === 'boolean';
      case 'array':
        return Array.isArray(value);
      case 'object':
        return isRecord(value);
    }
  }

  /**
   * Generate human-readable validation report
   */
  generateValidationReport(result: ValidationResult): string {
    let report = 'Configuration Validation Report\n';
    report += '==================================\n\n';

    if (result.isValid) {
      report += '✅ Configuration is valid!\n\n';
    } else {
      report += '❌ Configuration has errors:\n\n';

      result.errors.forEach((error, index) => {
        report += `${index + 1}. ${error.path}: ${error.message}\n`;
        if (error.value !== undefined) {
          report += `   Value: ${JSON.stringify(error.value)}\n`;
        }
        if (error.expected) {
          report += `   Expected: ${error.expected}\n`;
        }
        report += '\n';
      });
    }

    if (result.warnings.length > 0) {
      report += '⚠️  Warnings:\n\n';
      result.warnings.forEach((warning, index) => {
        report += `${index + 1}. ${warning}\n`;
      });
      report += '\n';
    }

    return report;
  }
}

export default ConfigValidator;
