import { convert, convertWithMetadata, toOutline } from '../src/converter';
import type { ConvertOptions } from '../src/types';

// ---------------------------------------------------------------------------
// convert()
// ---------------------------------------------------------------------------

describe('convert', () => {
  // -- Markdown target (default) -------------------------------------------

  describe('markdown target', () => {
    it('should unify bullets and re-indent by level', () => {
      expect(convert({ text: '  - item\n    * sub\n' })).toBe('  - item\n    - sub\n');
    });

    it('should normalize numbered markers', () => {
      expect(convert({ text: '1) first\n2) second\n' })).toBe('1. first\n2. second\n');
    });

    it('should normalize line endings before measuring indentation', () => {
      expect(convert({ text: '- a\r\n\t- b\r\n' })).toBe('- a\n  - b\n');
    });

    it('should count NBSP indentation as spaces', () => {
      expect(convert({ text: '- a\n\u00A0\u00A0- b' })).toBe('- a\n  - b');
    });

    it('should convert smart quotes by default', () => {
      expect(convert({ text: '- \u201Chi\u201D' })).toBe('- "hi"');
    });

    it('should keep smart quotes when conversion is disabled', () => {
      expect(convert({ text: '- \u201Chi\u201D', convertSmartQuotes: false })).toBe(
        '- \u201Chi\u201D',
      );
    });
  });

  // -- Blank lines -------------------------------------------------------------

  describe('blank lines', () => {
    it('should collapse runs of blank lines', () => {
      expect(convert({ text: 'a\n\n\n\nb\n' })).toBe('a\n\nb\n');
    });

    it('should keep blank lines when collapsing is disabled', () => {
      expect(convert({ text: 'a\n\n\n\nb\n', collapseBlankLines: false })).toBe('a\n\n\n\nb\n');
    });
  });

  // -- Other targets ---------------------------------------------------------

  describe('other targets', () => {
    it('should wrap chat-safe output in a fence', () => {
      expect(convert({ text: '- a\n  - b\n', target: 'chat-safe' })).toBe(
        '```\n- a\n  - b\n\n```',
      );
    });

    it('should skip the wrap when chatWrapCodeblock is false', () => {
      expect(
        convert({ text: '- a\n  - b', target: 'chat-safe', chatWrapCodeblock: false }),
      ).toBe('- a\n  - b');
    });

    it('should return an empty string for empty chat-safe input', () => {
      expect(convert({ text: '', target: 'chat-safe' })).toBe('');
    });

    it('should not wrap whitespace-only chat-safe input', () => {
      const text = '  \n\t';
      expect(convert({ text, target: 'chat-safe' })).toBe('\n');
      expect(convert({ text, target: 'chat-safe' })).toBe(convert({ text }));
    });

    it('should render tab-indented document bullets', () => {
      expect(convert({ text: '- a\n  - b', target: 'document-bullet' })).toBe('• a\n\t• b');
    });

    it('should leave markers alone for the plain target', () => {
      expect(convert({ text: '\t* a  \n   1) b', target: 'plain' })).toBe('  * a\n   1) b');
    });

    it('should produce level/text records for the outline target', () => {
      const json = convert({ text: '  - a\n    - b\n', target: 'outline' });
      expect(JSON.parse(json)).toEqual([
        { level: 1, text: '- a' },
        { level: 2, text: '- b' },
      ]);
    });

    it('should join lines verbatim for an unknown target', () => {
      expect(convert({ text: '  * a\t\n', target: 'html' })).toBe('  * a\t\n');
    });
  });

  // -- Source pre-clean ------------------------------------------------------

  describe('source pre-clean', () => {
    it('should turn document-editor bullet tabs into nested items', () => {
      expect(convert({ text: '•\tA\n\t•\tB', source: 'document-editor' })).toBe(
        '- A\n  - B',
      );
    });

    it('should collapse chat quote markers', () => {
      expect(convert({ text: '>>> quote\n- a', source: 'chat' })).toBe('> quote\n- a');
    });

    it('should ignore an unknown source', () => {
      expect(convert({ text: '>>> quote', source: 'fax' })).toBe('>>> quote');
    });
  });

  // -- Code fences -----------------------------------------------------------

  describe('code fences', () => {
    const block = '```sql\n    * keep   \n\n\n\n\tSELECT 1\n```';

    it('should restore a protected block byte for byte', () => {
      const input = `- a\n${block}\n    * b\n`;
      expect(convert({ text: input })).toBe(`- a\n${block}\n    - b\n`);
    });

    it.each([['markdown'], ['chat-safe'], ['document-bullet'], ['plain']])(
      'should keep the block intact for the %s target',
      (target) => {
        expect(convert({ text: `- a\n${block}\n`, target })).toContain(block);
      },
    );

    it('should keep the block intact inside the outline JSON', () => {
      const json = convert({ text: `- a\n${block}\n`, target: 'outline' });
      expect(JSON.parse(json)).toEqual([
        { level: 0, text: '- a' },
        { level: 0, text: block },
      ]);
    });

    it('should reformat fence contents when protection is disabled', () => {
      expect(convert({ text: 'x\n```\n    * keep\n```', keepCodeFences: false })).toBe(
        'x\n```\n    - keep\n```',
      );
    });

    it('should treat an unterminated fence as ordinary text', () => {
      expect(convert({ text: '```\n  * a' })).toBe('```\n  - a');
    });
  });

  // -- Edge cases ------------------------------------------------------------

  describe('edge cases', () => {
    it('should return an empty string for empty input', () => {
      expect(convert({ text: '' })).toBe('');
    });

    it('should return an empty array for empty outline input', () => {
      expect(convert({ text: '', target: 'outline' })).toBe('[]');
    });

    it('should treat missing text from an untyped caller as empty', () => {
      const options: ConvertOptions = JSON.parse('{"target":"markdown"}');
      expect(convert(options)).toBe('');
    });

    it('should fall back to the default indent size for an unsupported value', () => {
      const options: ConvertOptions = JSON.parse('{"text":"    - a","indentSize":5}');
      expect(convert(options)).toBe('    - a');
    });

    it('should not modify the caller input', () => {
      const options = { text: '  * a' };
      convert(options);
      expect(options.text).toBe('  * a');
    });
  });
});

// ---------------------------------------------------------------------------
// convertWithMetadata()
// ---------------------------------------------------------------------------

describe('convertWithMetadata', () => {
  it('should return output and document metadata', () => {
    const result = convertWithMetadata({ text: '- a\n  - b\n    - c\n\n```\nx\n```\n' });
    expect(result.output).toBe('- a\n  - b\n    - c\n\n```\nx\n```\n');
    expect(result.metadata).toEqual({
      source: 'auto',
      target: 'markdown',
      lineCount: 6,
      itemCount: 4,
      maxLevel: 2,
      codeBlockCount: 1,
    });
  });

  it('should report zeros for empty input', () => {
    const { metadata } = convertWithMetadata({ text: '', target: 'plain' });
    expect(metadata).toEqual({
      source: 'auto',
      target: 'plain',
      lineCount: 1,
      itemCount: 0,
      maxLevel: 0,
      codeBlockCount: 0,
    });
  });
});

// ---------------------------------------------------------------------------
// toOutline()
// ---------------------------------------------------------------------------

describe('toOutline', () => {
  it('should return records regardless of the target setting', () => {
    expect(toOutline({ text: '- a\n\n  - b', target: 'plain' })).toEqual([
      { level: 0, text: '- a' },
      { level: 1, text: '- b' },
    ]);
  });

  it('should restore protected blocks into record text', () => {
    expect(toOutline({ text: '- a\n  ```\n  code\n  ```\n' })).toEqual([
      { level: 0, text: '- a' },
      { level: 1, text: '```\n  code\n  ```' },
    ]);
  });

  it('should return an empty array for empty input', () => {
    expect(toOutline({ text: '' })).toEqual([]);
  });
});
