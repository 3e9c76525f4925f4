import { describe, it, expect } from 'vitest';
import { wrapText } from '../src/tabular/wrap.js';

describe('wrapText', () => {
  it('returns a single empty line for an empty message', () => {
    expect(wrapText('', 50)).toEqual(['']);
    expect(wrapText('   \n\t ', 50)).toEqual(['']);
  });

  it('keeps short messages on one line', () => {
    expect(wrapText('Microphone ready', 50)).toEqual(['Microphone ready']);
  });

  it('fills lines greedily and breaks only between words', () => {
    expect(wrapText('aaa bbb ccc ddd', 7)).toEqual(['aaa bbb', 'ccc ddd']);
    expect(wrapText('aaa bbb ccc ddd', 8)).toEqual(['aaa bbb', 'ccc ddd']);
    expect(wrapText('aaa bbb ccc ddd', 11)).toEqual(['aaa bbb ccc', 'ddd']);
  });

  it('cuts an over-long word to fill the line, then in width-sized chunks', () => {
    expect(wrapText('go supercalifragilistic now', 10)).toEqual(['go superca', 'lifragilis', 'tic now']);
    expect(wrapText('x'.repeat(25), 10)).toEqual(['x'.repeat(10), 'x'.repeat(10), 'x'.repeat(5)]);
  });

  it('starts a new line for a long word when the current one is full', () => {
    expect(wrapText('abcdefghi ' + 'z'.repeat(12), 10)).toEqual(['abcdefghi', 'z'.repeat(10), 'zz']);
  });

  it('collapses whitespace runs, tabs and newlines', () => {
    expect(wrapText('  one\t two\n\nthree  ', 50)).toEqual(['one two three']);
  });

  it('re-joins to the original words and respects the width', () => {
    const words = Array.from({ length: 40 }, (_, i) => 'w'.repeat((i % 7) + 1));
    const message = words.join(' ');
    const lines = wrapText(message, 20);

    expect(lines.join(' ')).toBe(message);
    for (const line of lines) {
      expect(line.length).toBeLessThanOrEqual(20);
    }
  });
});
