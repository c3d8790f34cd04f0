import { clipText, normalizeText } from './textNormalizer';

describe('normalizeText', () => {
  it('unifies line endings and collapses whitespace', () => {
    expect(normalizeText('  Total:\t 12.50\r\n\r\n\r\n\r\nTaxi    fare \n')).toBe('Total: 12.50\n\nTaxi fare');
  });
});

describe('clipText', () => {
  it('returns short text unchanged', () => {
    expect(clipText('receipt', 10)).toBe('receipt');
  });

  it('keeps the head and tail of long text', () => {
    expect(clipText('abcdefghij', 5)).toBe('abc\n...\nij');
  });
});
