import {
  DROP_RULES,
  LineClassifier,
  REWARD_RULES,
  cleanMessage,
  detectChannel,
  extractMessage,
  isReservedSpeaker,
} from '../line-classifier';

describe('cleanMessage', () => {
  it('should strip timestamp, thread and chat tags', () => {
    expect(
      cleanMessage('[12:34:56] [Client thread/INFO]: [CHAT] <Alex> gg')
    ).toBe('<Alex> gg');
  });

  it('should strip color codes anywhere in the line', () => {
    expect(cleanMessage('§b[MVP+] Notch§f: hi there')).toBe(
      '[MVP+] Notch: hi there'
    );
  });

  it('should strip a full date timestamp', () => {
    expect(cleanMessage('[2024-05-01 10:00:00] <Steve> hi')).toBe(
      '<Steve> hi'
    );
  });

  it('should return the trimmed original when cleaning leaves nothing', () => {
    expect(cleanMessage('  §§§  ')).toBe('§§§');
    expect(cleanMessage('[12:34:56]')).toBe('[12:34:56]');
  });

  it('should be idempotent', () => {
    const samples = [
      '[12:34:56] [Client thread/INFO]: [CHAT] <Alex> gg',
      '§b[MVP+] Notch§f: hi there',
      '[12:00:00] [main] [Render thread/CHAT]: <Zed> yo',
      '§§§',
      'plain text',
      '',
    ];

    for (const sample of samples) {
      const once = cleanMessage(sample);
      expect(cleanMessage(once)).toBe(once);
    }
  });
});

describe('cleanMessage with extractMessage', () => {
  const speakers = ['Steve', 'Alex_99', 'xX_Pro_Xx', 'bob', 'Notch2011'];
  const messages = [
    'hello world',
    'gg wp',
    '  padded both sides  ',
    'ratio: 3 to 1',
    'a > b, right?',
    'meet at 120, 64, -300',
    '你好 世界',
    'こんにちは',
    "don't go in there!!",
    'INFO is just a word',
  ];
  const prefixes = ['', '[12:34:56] ', '[12:34:56] [Client thread/INFO]: [CHAT] '];

  it('should recover every speaker and message it did not need to rewrite', () => {
    for (const prefix of prefixes) {
      for (const speaker of speakers) {
        for (const message of messages) {
          const line = `${prefix}<${speaker}> ${message}`;
          const cleaned = cleanMessage(line);

          expect(cleaned).toBe(`<${speaker}> ${message}`.trim());
          expect(cleanMessage(cleaned)).toBe(cleaned);
          expect(extractMessage(cleaned)).toEqual({
            speaker,
            message: message.trim(),
          });
        }
      }
    }
  });

  it('should rewrite only color codes, known tags and code letters before a bracket', () => {
    expect(cleanMessage('<Steve> x§ay')).toBe('<Steve> xy');
    expect(cleanMessage('<Steve> use [CHAT] tag')).toBe('<Steve> use tag');
    expect(cleanMessage('<Steve> check a[1] now')).toBe('<Steve> check [1] now');
    expect(cleanMessage('<Steve> check ab[1] now')).toBe('<Steve> check ab[1] now');
  });
});

describe('extractMessage', () => {
  it('should recover speaker and message from a cleaned chat line', () => {
    expect(extractMessage(cleanMessage('<Steve> hello world'))).toEqual({
      speaker: 'Steve',
      message: 'hello world',
    });
  });

  it('should find the speaker inside a channel-tagged line', () => {
    expect(
      extractMessage('[12:00:00] [main] [Render thread/CHAT]: <Zed> yo')
    ).toEqual({ speaker: 'Zed', message: 'yo' });
  });

  it('should return no speaker for reserved tokens', () => {
    expect(extractMessage('Max: 256 (512)')).toEqual({
      speaker: undefined,
      message: 'Max: 256 (512)',
    });
  });

  it('should return the cleaned text when there is no speaker', () => {
    expect(extractMessage('[12:34:56] Welcome to the server')).toEqual({
      speaker: undefined,
      message: 'Welcome to the server',
    });
  });
});

describe('isReservedSpeaker', () => {
  it('should match memory-stat labels only', () => {
    expect(isReservedSpeaker('Max')).toBe(true);
    expect(isReservedSpeaker('free')).toBe(true);
    expect(isReservedSpeaker('Maxwell')).toBe(false);
  });
});

describe('detectChannel', () => {
  it('should default to public', () => {
    expect(detectChannel('<Steve> hi', '<Steve> hi')).toBe('public');
  });

  it('should recognize private, team and guild markers', () => {
    expect(detectChannel('Steve whispers to you: hi', 'Steve whispers to you: hi')).toBe('private');
    expect(detectChannel('[TEAM] <Alex> rush mid', '[TEAM] <Alex> rush mid')).toBe('team');
    expect(detectChannel('[GUILD] <Bob> hello', '[GUILD] <Bob> hello')).toBe('guild');
  });

  it('should give private priority over team', () => {
    expect(detectChannel('[TEAM] <Alex> pm me', '[TEAM] <Alex> pm me')).toBe('private');
  });

  it('should give team priority over guild', () => {
    expect(detectChannel('[GUILD] party up', '[GUILD] party up')).toBe('team');
  });

  it('should return system for system messages', () => {
    expect(detectChannel('[TEAM] x', '[TEAM] x', 'system')).toBe('system');
  });
});

describe('LineClassifier', () => {
  let classifier: LineClassifier;

  beforeEach(() => {
    classifier = new LineClassifier();
  });

  describe('classify', () => {
    it('should classify an angle-bracket chat line', () => {
      expect(classifier.classify('<Steve> hello world')).toEqual({
        category: 'chat',
        text: '<Steve> hello world',
        raw: '<Steve> hello world',
        speaker: 'Steve',
        message: 'hello world',
        channel: 'public',
        keep: true,
        rule: 'angle',
      });
    });

    it('should classify a rank-prefixed colon chat line', () => {
      const result = classifier.classify('§b[MVP+] Notch§f: hi there');

      expect(result.category).toBe('chat');
      expect(result.speaker).toBe('Notch');
      expect(result.message).toBe('hi there');
      expect(result.rule).toBe('colon');
    });

    it('should classify a channel-tagged line with its inner speaker', () => {
      const result = classifier.classify(
        '[12:00:00] [main] [Render thread/CHAT]: <Zed> yo'
      );

      expect(result.category).toBe('chat');
      expect(result.speaker).toBe('Zed');
      expect(result.text).toBe('<Zed> yo');
      expect(result.rule).toBe('chat-channel');
    });

    it('should not treat memory statistics as chat', () => {
      const result = classifier.classify('Max: 256 (512)');

      expect(result.category).toBe('noise');
      expect(result.rule).toBe('memory-stat');
      expect(result.keep).toBe(false);
    });

    it('should not treat memory statistics as chat with the filter off', () => {
      const result = classifier.withOptions({ enabled: false }).classify('Max: 256 (512)');

      expect(result.category).toBe('info');
      expect(result.speaker).toBeUndefined();
    });

    it('should drop client noise with the id of the first matching rule', () => {
      const result = classifier.classify(
        '[12:00:00] [Client thread/INFO]: Connecting to mc.example.net, 25565'
      );

      expect(result).toEqual({
        category: 'noise',
        text: 'Connecting to mc.example.net, 25565',
        raw: '[12:00:00] [Client thread/INFO]: Connecting to mc.example.net, 25565',
        message: 'Connecting to mc.example.net, 25565',
        keep: false,
        rule: 'connecting',
      });
    });

    it('should drop slash commands and symbol-only lines', () => {
      expect(classifier.classify('/party invite Steve').rule).toBe('slash-command');
      expect(classifier.classify('>>>').rule).toBe('symbols-only');
    });

    it('should require a letter in the chat message', () => {
      const result = classifier.classify('<Steve> 123');

      expect(result.category).toBe('info');
      expect(result.keep).toBe(false);
    });

    it('should accept chat in non-Latin scripts', () => {
      const result = classifier.classify('<小明> 你好');

      expect(result.category).toBe('chat');
      expect(result.speaker).toBe('小明');
    });

    it('should return noise for empty lines', () => {
      expect(classifier.classify('   ')).toEqual({
        category: 'noise',
        text: '',
        raw: '   ',
        message: '',
        keep: false,
      });
    });

    it('should detect the team channel on chat lines', () => {
      const result = classifier.classify('[TEAM] <Alex> rush mid');

      expect(result.speaker).toBe('Alex');
      expect(result.message).toBe('rush mid');
      expect(result.channel).toBe('team');
    });
  });

  describe('system messages', () => {
    it('should keep system messages only when keepSystem is set', () => {
      expect(classifier.classify('Steve joined the game').keep).toBe(false);

      const result = classifier
        .withOptions({ keepSystem: true })
        .classify('Steve joined the game');
      expect(result).toEqual({
        category: 'system',
        text: 'Steve joined the game',
        raw: 'Steve joined the game',
        message: 'Steve joined the game',
        channel: 'system',
        keep: true,
        rule: 'joined',
      });
    });
  });

  describe('rewards', () => {
    it('should drop reward toasts unless keepRewards is set', () => {
      const dropped = classifier.classify('+25 tokens! (Win)');
      expect(dropped.category).toBe('noise');
      expect(dropped.rule).toBe('reward-tokens');

      const kept = classifier
        .withOptions({ keepRewards: true })
        .classify('+25 tokens! (Win)');
      expect(kept.category).toBe('info');
    });
  });

  describe('shouldKeep', () => {
    it('should keep every non-empty line when the filter is disabled', () => {
      const passAll = classifier.withOptions({ enabled: false });
      const lines = [
        'Max: 256 (512)',
        '+25 tokens! (Win)',
        '/party invite Steve',
        'Steve joined the game',
        'Connecting to mc.example.net, 25565',
        '>>>',
        '<Steve> hello',
      ];

      for (const line of lines) {
        expect(passAll.shouldKeep(line)).toBe(true);
      }
    });

    it('should never keep an empty line', () => {
      expect(classifier.withOptions({ enabled: false }).shouldKeep('')).toBe(false);
    });
  });

  describe('withOptions', () => {
    it('should return a new snapshot and leave the original untouched', () => {
      const next = classifier.withOptions({ keepSystem: true });

      expect(next).not.toBe(classifier);
      expect(next.options.keepSystem).toBe(true);
      expect(classifier.options.keepSystem).toBe(false);
      expect(Object.isFrozen(next.options)).toBe(true);
    });
  });

  describe('describeRules', () => {
    it('should list reward rules among drop rules by default', () => {
      const rules = classifier.describeRules();

      expect(rules.drop).toHaveLength(DROP_RULES.length + REWARD_RULES.length);
      expect(rules.drop[0]).toBe('menu-open: <Opening menu>.*');
      expect(rules.system).toEqual([]);
      expect(rules.chat.map(rule => rule.split(':')[0])).toEqual([
        'angle',
        'chat-channel',
        'chat-tag',
        'colon',
      ]);
      expect(rules.channels.map(rule => rule.split(':')[0])).toEqual([
        'private',
        'team',
        'guild',
      ]);
    });

    it('should list no drop rules when the filter is off', () => {
      expect(classifier.withOptions({ enabled: false }).describeRules().drop).toEqual([]);
    });
  });
});
