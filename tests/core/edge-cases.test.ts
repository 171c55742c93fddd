/**
 * Integration tests for properties that span the full pipeline
 * (normalizer -> pre-clean -> fence vault -> resolvers -> renderers).
 */
import { convert } from '../../src/converter';
import { unifyMarker } from '../../src/core/marker-unifier';

const MESSY_OUTLINE = [
  '• Goals',
  '\t◦ ship',
  '\t\t1) docs',
  '    * tests   ',
  '',
  '',
  '',
  'Done',
].join('\n');

describe('Properties - full pipeline', () => {
  describe('idempotence', () => {
    it('should produce canonical markdown on the first pass', () => {
      expect(convert({ text: MESSY_OUTLINE })).toBe(
        '- Goals\n  - ship\n    1. docs\n    - tests\n\nDone',
      );
    });

    it.each([[2], [4]] as const)(
      'should reproduce markdown output when converted again (indent %d)',
      (indentSize) => {
        const once = convert({ text: MESSY_OUTLINE, indentSize });
        const twice = convert({ text: once, source: 'markdown', indentSize });
        expect(twice).toBe(once);
      },
    );
  });

  describe('code-fence invariance', () => {
    const block = '```\n  *  odd   spacing\t\n\n\n\n1) not a list\n```';

    it.each([
      [{ target: 'markdown' }],
      [{ target: 'document-bullet', indentSize: 4 }],
      [{ target: 'plain', trimTrailingWhitespace: true }],
      [{ target: 'chat-safe', collapseBlankLines: true }],
      [{ source: 'chat', convertSmartQuotes: false }],
    ] as const)('should keep the block byte-identical with %j', (settings) => {
      const output = convert({ ...settings, text: `- before\n${block}\n  - after` });
      expect(output).toContain(block);
    });
  });

  describe('marker unification closure', () => {
    it.each([['* a'], ['– b'], ['iv) c'], ['Z. d'], ['no marker'], ['- e']])(
      'unify(unify(%j)) equals unify(%j)',
      (line) => {
        expect(unifyMarker(unifyMarker(line))).toBe(unifyMarker(line));
      },
    );
  });

  describe('blank-line collapse bound', () => {
    it.each([
      ['markdown'],
      ['chat-safe'],
      ['document-bullet'],
      ['plain'],
    ])('should leave no run of three newlines for %s', (target) => {
      const text = 'a\n\n\n\n\n- b\n \n\t\n\n  - c\n\n\n';
      const output = convert({ text, target });
      expect(output).not.toMatch(/\n{3,}/);
    });
  });
});
