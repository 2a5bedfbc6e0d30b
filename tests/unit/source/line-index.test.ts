import { describe, expect, it } from 'vitest';
import { LineIndex } from '../../../src/source/line-index.js';

describe('LineIndex', () => {
  const index = new LineIndex('ab\ncd\r\nef\rg');

  it('counts lines for every terminator style', () => {
    expect(index.lineCount).toBe(4);
  });

  it('maps offsets to positions', () => {
    expect(index.positionAt(0)).toEqual({ line: 1, column: 1 });
    expect(index.positionAt(4)).toEqual({ line: 2, column: 2 });
    expect(index.positionAt(10)).toEqual({ line: 4, column: 1 });
  });

  it('clamps offsets past the end', () => {
    expect(index.positionAt(100)).toEqual({ line: 4, column: 2 });
  });

  it('returns line text without terminators', () => {
    expect(index.lineText(1)).toBe('ab');
    expect(index.lineText(2)).toBe('cd');
    expect(index.lineText(3)).toBe('ef');
    expect(index.lineText(4)).toBe('g');
  });

  it('has one empty line for empty text', () => {
    const empty = new LineIndex('');
    expect(empty.lineCount).toBe(1);
    expect(empty.lineText(1)).toBe('');
    expect(empty.positionAt(0)).toEqual({ line: 1, column: 1 });
  });
});
