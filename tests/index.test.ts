import * as api from '../src/index';
import * as core from '../src/core/index';

describe('public API', () => {
  it('should expose the conversion entry points', () => {
    expect(api.convert({ text: '* a' })).toBe('- a');
    expect(api.toOutline({ text: '* a' })).toEqual([{ level: 0, text: '- a' }]);
    expect(api.convertWithMetadata({ text: '' }).output).toBe('');
  });

  it('should re-export the core stages', () => {
    expect(api.normalize).toBe(core.normalize);
    expect(api.unifyMarker).toBe(core.unifyMarker);
    expect(api.renderOutline).toBe(core.renderOutline);
    expect(core.RENDERERS.plain).toBe(core.renderPlain);
  });

  it('should expose the error hierarchy', () => {
    const err = new api.InputReadError('in.txt', 'gone');
    expect(err).toBeInstanceOf(api.OutlinePorterError);
    expect(err.message).toBe('Cannot read input "in.txt": gone');
  });
});
