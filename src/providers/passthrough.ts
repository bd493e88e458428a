import { BaseTranslationEngine, EngineResult, engineSuccess } from './base-provider';

export interface PassthroughOptions {
  /** Prepend `[source->target]` so dry runs show what would be sent. */
  annotate?: boolean;
}

/**
 * Offline engine that hands the text back. Used for dry runs and wherever
 * no real provider has been registered.
 */
export class PassthroughEngine extends BaseTranslationEngine {
  override readonly id = 'passthrough';
  private annotate: boolean;

  constructor(options: PassthroughOptions = {}) {
    super();
    this.annotate = options.annotate ?? false;
  }

  protected override async performTranslation(
    text: string,
    sourceLanguage: string,
    targetLanguage: string
  ): Promise<EngineResult> {
    if (!this.annotate) {
      return engineSuccess(text);
    }
    return engineSuccess(`[${sourceLanguage}->${targetLanguage}] ${text}`);
  }
}

export default PassthroughEngine;
