/**
 * Outcome of one engine call. Exactly one of `text` and `error` is set.
 */
export interface EngineResult {
  text: string | null;
  error: string | null;
}

export interface TranslationEngine {
  readonly id: string;
  translate(
    text: string,
    sourceLanguage: string,
    targetLanguage: string
  ): Promise<EngineResult>;
}

export interface EngineCapabilities {
  supportsAutoDetect: boolean;
  maxTextLength: number;
}

export function engineSuccess(text: string): EngineResult {
  return { text, error: null };
}

export function engineFailure(error: string): EngineResult {
  return { text: null, error };
}

/**
 * Base class for engines: validates the request, then delegates to
 * {@link BaseTranslationEngine.performTranslation}. A thrown error becomes a
 * failed result carrying the engine id and the error message.
 */
export abstract class BaseTranslationEngine implements TranslationEngine {
  abstract readonly id: string;

  protected abstract performTranslation(
    text: string,
    sourceLanguage: string,
    targetLanguage: string
  ): Promise<EngineResult>;

  async translate(
    text: string,
    sourceLanguage: string,
    targetLanguage: string
  ): Promise<EngineResult> {
    const sanitized = text.trim();
    if (!sanitized) {
      return engineFailure('Text is empty');
    }

    const { maxTextLength } = this.getCapabilities();
    if (sanitized.length > maxTextLength) {
      return engineFailure(
        `Text exceeds ${maxTextLength} characters for ${this.id}`
      );
    }

    if (!this.isValidLanguageCode(targetLanguage)) {
      return engineFailure(`Invalid target language code: ${targetLanguage}`);
    }

    if (sourceLanguage !== 'auto' && !this.isValidLanguageCode(sourceLanguage)) {
      return engineFailure(`Invalid source language code: ${sourceLanguage}`);
    }

    try {
      return await this.performTranslation(
        sanitized,
        sourceLanguage,
        targetLanguage
      );
    } catch (error) {
      return engineFailure(
        `${this.id} failed: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
  }

  /**
   * ISO 639-1 (2 letters) or ISO 639-2 (3 letters) with optional region
   */
  protected isValidLanguageCode(code: string): boolean {
    return /^[a-z]{2,3}([-_][A-Za-z]{2,4})?$/.test(code);
  }

  getCapabilities(): EngineCapabilities {
    return {
      supportsAutoDetect: true,
      maxTextLength: 4000,
    };
  }
}

export default BaseTranslationEngine;
