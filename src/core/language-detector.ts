import {
  LanguageTag,
  SUPPORTED_LANGUAGES,
  SupportedLanguage,
} from "../types";

interface LanguageCue {
  pattern: RegExp;
  weight: number;
  /** Letters no other profile uses; one hit is enough to pick the language. */
  distinctive?: boolean;
}

interface LanguageProfile {
  language: SupportedLanguage;
  /** Latin-script languages share the letter-count base score. */
  latin: boolean;
  cues: LanguageCue[];
}

export interface DetectionAnalysis {
  language: LanguageTag;
  hanShortcut: boolean;
  scores: Partial<Record<SupportedLanguage, number>>;
}

const HAN = /[\u4e00-\u9fff]/;
const LATIN_LETTERS = /[A-Za-z\u00c0-\u00d6\u00d8-\u00f6\u00f8-\u00ff]/g;
const LATIN_LETTER_WEIGHT = 1.5;
// Distinct cue words a non-English Latin profile needs beyond English's.
const MIN_CUE_MARGIN = 2;

// Order matters: on equal scores the earlier profile wins, so plain Latin
// text without cues stays English.
const PROFILES: LanguageProfile[] = [
  {
    language: "en",
    latin: true,
    cues: [
      {
        pattern: /\b(the|and|you|that|have|for|not|with|this|but)\b/gi,
        weight: 2,
      },
      { pattern: /\b(is|are|was|were|be|been|being)\b/gi, weight: 2 },
    ],
  },
  {
    language: "zh",
    latin: false,
    cues: [
      { pattern: /[\u3400-\u4dbf]/g, weight: 2 }, // Extension A
      { pattern: /[\u{20000}-\u{2a6df}]/gu, weight: 2 }, // Extension B
    ],
  },
  {
    language: "ja",
    latin: false,
    cues: [
      { pattern: /[\u3040-\u309f]/g, weight: 1 }, // Hiragana
      { pattern: /[\u30a0-\u30ff]/g, weight: 1 }, // Katakana
    ],
  },
  {
    language: "ko",
    latin: false,
    cues: [
      { pattern: /[\uac00-\ud7af]/g, weight: 1 },
      { pattern: /[\u1100-\u11ff]/g, weight: 1 },
      { pattern: /[\u3130-\u318f]/g, weight: 1 },
    ],
  },
  {
    language: "ru",
    latin: false,
    cues: [{ pattern: /[\u0400-\u04ff]/g, weight: 1 }],
  },
  {
    language: "fr",
    latin: true,
    cues: [
      {
        pattern:
          /\b(le|la|les|des|est|et|je|tu|vous|nous|pas|une|avec|pour|dans|oui|merci|bonjour)\b/gi,
        weight: 2,
      },
      { pattern: /[àâçèêëîïôûùœ]/gi, weight: 2, distinctive: true },
    ],
  },
  {
    language: "de",
    latin: true,
    cues: [
      {
        pattern:
          /\b(der|die|das|und|ist|nicht|ich|du|wir|mit|ein|eine|auf|zu|nein|danke)\b/gi,
        weight: 2,
      },
      { pattern: /[äöüß]/gi, weight: 2, distinctive: true },
    ],
  },
  {
    language: "es",
    latin: true,
    cues: [
      {
        pattern:
          /\b(el|los|las|es|y|que|por|con|una|pero|para|hola|gracias|muy)\b/gi,
        weight: 2,
      },
      { pattern: /[ñ¿¡áíóú]/gi, weight: 2, distinctive: true },
    ],
  },
];

function countMatches(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0;
}

interface CueEvidence {
  words: number;
  marks: number;
}

function cueEvidence(text: string, profile: LanguageProfile): CueEvidence {
  const words = new Set<string>();
  let marks = 0;
  for (const cue of profile.cues) {
    const matches = text.match(cue.pattern) ?? [];
    if (cue.distinctive) {
      marks += matches.length;
    } else {
      for (const match of matches) words.add(match.toLowerCase());
    }
  }
  return { words: words.size, marks };
}

/**
 * Collapse a language code or locale (`zh-CN`, `en_US`, `DE`) to a supported
 * tag, or `unknown` when the primary subtag is not one we detect.
 */
export function normalizeLanguage(code: string): LanguageTag {
  const primary = code.trim().toLowerCase().split(/[-_]/)[0] ?? "";
  const match = SUPPORTED_LANGUAGES.find(language => language === primary);
  return match ?? "unknown";
}

export class LanguageDetector {
  /**
   * Classify text into a language tag.
   *
   * Any Han ideograph short-circuits to Chinese. This also catches Japanese
   * written only in Kanji, which is accepted product behaviour.
   */
  detect(text: string): LanguageTag {
    return this.analyze(text).language;
  }

  analyze(text: string): DetectionAnalysis {
    const trimmed = text.trim();
    if (!trimmed) {
      return { language: "unknown", hanShortcut: false, scores: {} };
    }

    if (HAN.test(trimmed)) {
      return { language: "zh", hanShortcut: true, scores: {} };
    }

    const latinLetters = countMatches(trimmed, LATIN_LETTERS);
    const scores: Partial<Record<SupportedLanguage, number>> = {};
    let best: SupportedLanguage | null = null;
    let bestScore = 0;
    let englishWords = 0;

    for (const profile of PROFILES) {
      let score = profile.latin ? latinLetters * LATIN_LETTER_WEIGHT : 0;
      for (const cue of profile.cues) {
        score += countMatches(trimmed, cue.pattern) * cue.weight;
      }
      scores[profile.language] = score;

      if (profile.latin) {
        const evidence = cueEvidence(trimmed, profile);
        if (profile.language === "en") {
          englishWords = evidence.words;
        } else if (
          evidence.marks === 0 &&
          evidence.words - englishWords < MIN_CUE_MARGIN
        ) {
          // A single shared short word ("die", "la") is not enough to leave English.
          continue;
        }
      }

      if (score > bestScore) {
        best = profile.language;
        bestScore = score;
      }
    }

    if (best) {
      return { language: best, hanShortcut: false, scores };
    }

    return {
      language: latinLetters > 0 ? "en" : "unknown",
      hanShortcut: false,
      scores,
    };
  }

  /**
   * Whether text should be sent for translation into `targetLanguage`.
   * Undetectable text is translated; only a confirmed match is skipped.
   */
  shouldTranslate(text: string, targetLanguage: string): boolean {
    const detected = this.detect(text);
    if (detected === "unknown") {
      return true;
    }
    return detected !== normalizeLanguage(targetLanguage);
  }
}

export default LanguageDetector;
