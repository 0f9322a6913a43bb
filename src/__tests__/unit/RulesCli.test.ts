import { buildRuleDocument, createProgram } from '../../cli/rules-cli';
import { parseRuleDocument } from '../../engine/RuleLoader';

describe('rules-cli', () => {
  describe('buildRuleDocument', () => {
    test('should scaffold a valid document from prompt answers', () => {
      const document = buildRuleDocument({
        name: '  Late favourite ',
        type: 'ENDGAME_SWEEP',
        level: 'P1',
        cooldownSecs: 600,
        tags: 'sports, , endgame',
        scopeTags: 'sports,politics',
      });

      expect(document).toEqual({
        name: 'Late favourite',
        type: 'ENDGAME_SWEEP',
        enabled: true,
        tags: ['sports', 'endgame'],
        params: {},
        outputs: { level: 'P1' },
        scope: { tags: ['sports', 'politics'] },
        dedupe: { cooldown_secs: 600 },
      });
      expect(parseRuleDocument(JSON.stringify(document), 'scaffold')).toEqual(document);
    });

    test('should leave the scope open without scope tags', () => {
      const document = buildRuleDocument({
        name: 'Spike',
        type: 'SPIKE_DETECT',
        level: 'P2',
        cooldownSecs: 0,
        tags: '',
        scopeTags: ' ',
      });

      expect(document.scope).toEqual({});
      expect(document.tags).toEqual([]);
    });
  });

  describe('createProgram', () => {
    test('should register every subcommand', () => {
      expect(createProgram().commands.map(command => command.name())).toEqual([
        'validate',
        'list',
        'show-config',
        'new',
        'evaluate',
      ]);
    });
  });
});
