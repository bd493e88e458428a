import {
  ChatChannel,
  FilterOptions,
  MessageCategory,
} from '../types';

export interface FilterRule {
  id: string;
  pattern: RegExp;
}

export interface ChatShape extends FilterRule {
  /** Capture group holding the speaker, when the shape names one. */
  speakerGroup?: number;
  messageGroup: number;
}

export interface ChannelRuleGroup {
  channel: Exclude<ChatChannel, 'public' | 'system'>;
  patterns: RegExp[];
}

export interface ExtractedMessage {
  speaker: string | undefined;
  message: string;
}

export interface ClassifiedMessage {
  category: MessageCategory;
  /** Cleaned display text; `<speaker> message` for chat with a speaker. */
  text: string;
  raw: string;
  speaker?: string;
  /** Chat body without the speaker, or the cleaned text. */
  message: string;
  channel?: ChatChannel;
  keep: boolean;
  /** Id of the rule that decided the category. */
  rule?: string;
}

export interface RuleDescription {
  drop: string[];
  system: string[];
  chat: string[];
  channels: string[];
}

export const DEFAULT_FILTER_OPTIONS: FilterOptions = Object.freeze({
  enabled: true,
  keepSystem: false,
  keepRewards: false,
  showAll: false,
});

/** Client diagnostics and lobby chatter that never carries player chat. */
export const DROP_RULES: readonly FilterRule[] = [
  { id: 'menu-open', pattern: /<Opening menu>.*/i },
  { id: 'loading', pattern: /<Loading>.*/i },
  { id: 'menu-class', pattern: /Opening menu:\s+class\s+.*/i },
  { id: 'worker-connect', pattern: /Worker done, connecting to .*/i },
  { id: 'connecting', pattern: /Connecting to .*/i },
  { id: 'loading-screen', pattern: /\[LOADING-SCREEN\].*/i },
  { id: 'cosmetics', pattern: /Updating active cosmetics list\.\.\./i },
  { id: 'gl-support', pattern: /GL\d+\s+supported/i },
  { id: 'item-entity', pattern: /Item entity \d+ has no item\?!/i },
  { id: 'memory-debug-start', pattern: /-- Start Memory Debug --.*/i },
  { id: 'memory-debug-end', pattern: /-- End Memory Debug --.*/i },
  { id: 'memory-stat', pattern: /^(Max|Total|Free):\s+\d+\s*\(.*\)$/i },
  { id: 'memory-stat-tag', pattern: /^<(Max|Total|Free)>\s+\d+.*/i },
  { id: 'data-sync', pattern: /Data sync response failed:.*/i },
  { id: 'ping-timeout', pattern: /<Can't ping .*?>\s+Timed out/i },
  { id: 'ping', pattern: /Can't ping .*/i },
  { id: 'connection-state', pattern: /<Update Connection State>\s+\d+/i },
  { id: 'connection-server', pattern: /<Update Connection Server>\s+.*/i },
  {
    id: 'connection-status',
    pattern: /<Update connection status json2>\s+.*/i,
  },
  { id: 'lobby-banner', pattern: /^\s*Bed Wars\s*$/i },
  { id: 'slash-command', pattern: /^\s*\/\S+.*/i },
  { id: 'symbols-only', pattern: /^[^a-zA-Z0-9\u4e00-\u9fff]{1,3}$/i },
  { id: 'client-tag', pattern: /^<BLC>.*/i },
  { id: 'opponent-tag', pattern: /^<Opponent>.*/i },
];

/** Token and XP toasts; dropped unless `keepRewards` is set. */
export const REWARD_RULES: readonly FilterRule[] = [
  { id: 'reward-tokens', pattern: /^\+\d+\s+tokens!\s*\(.*\).*/i },
  { id: 'reward-xp', pattern: /^\+\d+\s+Bed Wars XP\s*\(.*\).*/i },
  { id: 'reward-doubled', pattern: /^Tokens just earned DOUBLED.*/i },
];

export const SYSTEM_RULES: readonly FilterRule[] = [
  { id: 'joined', pattern: /joined the game/i },
  { id: 'left', pattern: /left the game/i },
  { id: 'made-advancement', pattern: /has made the advancement/i },
  { id: 'completed', pattern: /has completed/i },
  { id: 'achievement', pattern: /achievement/i },
  { id: 'advancement', pattern: /advancement/i },
  { id: 'joined-zh', pattern: /玩家.*加入游戏/ },
  { id: 'left-zh', pattern: /玩家.*离开游戏/ },
  { id: 'advancement-zh', pattern: /完成了进度/ },
  { id: 'achievement-zh', pattern: /获得了成就/ },
];

/**
 * Chat line shapes, tried in order against cleaned text. The first shape that
 * matches decides; later shapes are not consulted.
 */
export const CHAT_SHAPES: readonly ChatShape[] = [
  {
    id: 'angle',
    pattern: /^(?:\[[^\]]*\]\s*)*<([^>]{1,32})>\s*(.*)$/,
    speakerGroup: 1,
    messageGroup: 2,
  },
  {
    id: 'chat-channel',
    pattern: /^\[.*?\]\s*\[.*?\/CHAT\]:\s*(.*)$/,
    messageGroup: 1,
  },
  {
    id: 'chat-tag',
    pattern: /^\[CHAT\]\s*(.*)$/,
    messageGroup: 1,
  },
  {
    id: 'colon',
    pattern: /^(?:\[[^\]]*\]\s*)*([A-Za-z0-9_]{3,16})\s*:\s*(.*)$/,
    speakerGroup: 1,
    messageGroup: 2,
  },
];

/** Checked in this order; the first group with a hit names the channel. */
export const CHANNEL_RULES: readonly ChannelRuleGroup[] = [
  {
    channel: 'private',
    patterns: [
      /\bwhispers?\b/i,
      /\b(tell|msg|pm)\b/i,
      /\bprivate\b/i,
      /(^|\s)(From|To) [A-Za-z0-9_]{3,16}:/,
      /私聊|悄悄话/,
    ],
  },
  {
    channel: 'team',
    patterns: [/\[TEAM\]/i, /\bteam\b/i, /\bparty\b/i, /队伍|团队/],
  },
  {
    channel: 'guild',
    patterns: [/\[GUILD\]/i, /\bguild\b/i, /公会|工会/],
  },
];

// Memory-stat labels that look like speakers in some client logs.
const RESERVED_SPEAKERS = /^(Max|Total|Free)$/i;

const HAS_LETTER = /\p{L}/u;

const CLEANUP_PATTERNS: readonly RegExp[] = [
  /^\[\d{2}:\d{2}:\d{2}\]\s*/,
  /^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\]\s*/,
  /^§[0-9a-fk-or]\s*/i,
  /^[0-9a-fk-or](?=\[)/i,
  /\[.*?INFO\]:\s*/gi,
  /\[.*?WARN\]:\s*/gi,
  /\[.*?ERROR\]:\s*/gi,
  /\[Client thread\]:\s*/gi,
  /\[Server thread\]:\s*/gi,
  /\[CHAT\]\s*/gi,
  // Color and style codes anywhere in the line, e.g. "§b[MVP+] name§f: msg".
  /§[0-9a-fk-or]/gi,
  /§/g,
  // Clients that lose the "§" leave the bare code letter before a bracket.
  /(?<![A-Za-z0-9_])[0-9a-fk-or](?=\[)/gi,
];

function cleanOnce(text: string): string {
  let cleaned = text;
  for (const pattern of CLEANUP_PATTERNS) {
    cleaned = cleaned.replace(pattern, '');
  }
  return cleaned.trim();
}

/**
 * Strip timestamps, level and thread tags, and color codes from a log line.
 *
 * Passes repeat until nothing changes, so `cleanMessage(cleanMessage(x))`
 * equals `cleanMessage(x)`. Text that cleans to nothing is returned trimmed
 * but otherwise untouched.
 */
export function cleanMessage(text: string): string {
  const original = text.trim();
  try {
    let current = original;
    let next = cleanOnce(current);
    while (next !== current) {
      current = next;
      next = cleanOnce(current);
    }
    return current || original;
  } catch {
    return original;
  }
}

export function isReservedSpeaker(name: string): boolean {
  return RESERVED_SPEAKERS.test(name.trim());
}

function firstMatch(
  rules: readonly FilterRule[],
  ...texts: string[]
): FilterRule | undefined {
  return rules.find(rule => texts.some(text => rule.pattern.test(text)));
}

interface ShapeMatch {
  shape: ChatShape;
  speaker: string | undefined;
  message: string;
}

function matchShape(cleaned: string, depth = 0): ShapeMatch | undefined {
  for (const shape of CHAT_SHAPES) {
    const match = shape.pattern.exec(cleaned);
    if (!match) {
      continue;
    }

    const message = (match[shape.messageGroup] ?? '').trim();
    if (shape.speakerGroup !== undefined) {
      const speaker = (match[shape.speakerGroup] ?? '').trim();
      return { shape, speaker, message };
    }

    // Shapes without a speaker may wrap one, e.g. "[..] [Client/CHAT]: <Steve> hi".
    const inner = depth === 0 ? matchShape(message, depth + 1) : undefined;
    if (inner?.speaker) {
      return { shape, speaker: inner.speaker, message: inner.message };
    }
    return { shape, speaker: undefined, message };
  }
  return undefined;
}

/**
 * Pull `(speaker, message)` out of a chat line. Lines that do not carry a
 * speaker, or whose speaker is a reserved token, yield `speaker: undefined`
 * and the cleaned text as the message.
 */
export function extractMessage(text: string): ExtractedMessage {
  const cleaned = cleanMessage(text);
  try {
    const match = matchShape(cleaned);
    if (!match?.speaker || isReservedSpeaker(match.speaker)) {
      return { speaker: undefined, message: cleaned };
    }
    return { speaker: match.speaker, message: match.message };
  } catch {
    return { speaker: undefined, message: cleaned };
  }
}

export function detectChannel(
  raw: string,
  cleaned: string,
  category?: MessageCategory
): ChatChannel {
  if (category === 'system') {
    return 'system';
  }

  const text = `${raw} ${cleaned}`;
  for (const group of CHANNEL_RULES) {
    if (group.patterns.some(pattern => pattern.test(text))) {
      return group.channel;
    }
  }
  return 'public';
}

export class LineClassifier {
  readonly options: FilterOptions;

  constructor(options: Partial<FilterOptions> = {}) {
    this.options = Object.freeze({ ...DEFAULT_FILTER_OPTIONS, ...options });
  }

  /**
   * Return a classifier over a new option snapshot. The current instance is
   * left untouched.
   */
  withOptions(patch: Partial<FilterOptions>): LineClassifier {
    return new LineClassifier({ ...this.options, ...patch });
  }

  cleanMessage(text: string): string {
    return cleanMessage(text);
  }

  extract(text: string): ExtractedMessage {
    return extractMessage(text);
  }

  detectChannel(raw: string, cleaned: string): ChatChannel {
    const category = this.isSystem(cleaned) ? 'system' : undefined;
    return detectChannel(raw, cleaned, category);
  }

  /**
   * Drop rules in effect for the current snapshot, in evaluation order.
   */
  activeDropRules(): readonly FilterRule[] {
    return this.options.keepRewards
      ? DROP_RULES
      : [...DROP_RULES, ...REWARD_RULES];
  }

  isSystem(cleaned: string): boolean {
    return (
      this.options.keepSystem &&
      firstMatch(SYSTEM_RULES, cleaned) !== undefined
    );
  }

  isChat(cleaned: string): boolean {
    const match = matchShape(cleaned);
    return match !== undefined && this.isChatMatch(match);
  }

  private isChatMatch(match: ShapeMatch): boolean {
    if (match.speaker !== undefined && isReservedSpeaker(match.speaker)) {
      return false;
    }
    return HAS_LETTER.test(match.message);
  }

  shouldKeep(raw: string): boolean {
    return this.classify(raw).keep;
  }

  classify(raw: string): ClassifiedMessage {
    const line = raw.trim();
    if (!line) {
      return { category: 'noise', text: '', raw, message: '', keep: false };
    }

    const cleaned = cleanMessage(line);
    try {
      return this.classifyCleaned(raw, line, cleaned);
    } catch {
      return {
        category: 'info',
        text: cleaned,
        raw,
        message: cleaned,
        keep: !this.options.enabled,
      };
    }
  }

  private classifyCleaned(
    raw: string,
    line: string,
    cleaned: string
  ): ClassifiedMessage {
    const passAll = !this.options.enabled;

    if (!passAll) {
      const dropped = firstMatch(this.activeDropRules(), line, cleaned);
      if (dropped) {
        return {
          category: 'noise',
          text: cleaned,
          raw,
          message: cleaned,
          keep: false,
          rule: dropped.id,
        };
      }
    }

    if (this.options.keepSystem) {
      const system = firstMatch(SYSTEM_RULES, cleaned);
      if (system) {
        return {
          category: 'system',
          text: cleaned,
          raw,
          message: cleaned,
          channel: 'system',
          keep: true,
          rule: system.id,
        };
      }
    }

    const match = matchShape(cleaned);
    if (match && this.isChatMatch(match)) {
      const { speaker, message } = match;
      return {
        category: 'chat',
        text: speaker ? `<${speaker}> ${message}` : cleaned,
        raw,
        ...(speaker ? { speaker } : {}),
        message,
        channel: detectChannel(line, cleaned, 'chat'),
        keep: true,
        rule: match.shape.id,
      };
    }

    return {
      category: 'info',
      text: cleaned,
      raw,
      message: cleaned,
      keep: passAll,
    };
  }

  describeRules(): RuleDescription {
    const format = (rule: FilterRule) => `${rule.id}: ${rule.pattern.source}`;
    return {
      drop: this.options.enabled ? this.activeDropRules().map(format) : [],
      system: this.options.keepSystem ? SYSTEM_RULES.map(format) : [],
      chat: CHAT_SHAPES.map(format),
      channels: CHANNEL_RULES.map(
        group =>
          `${group.channel}: ${group.patterns.map(p => p.source).join(' | ')}`
      ),
    };
  }
}

export default LineClassifier;
