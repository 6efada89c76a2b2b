import { describe, it, expect } from 'vitest';
import { joinLines, splitLines } from './text.js';

describe('splitLines', () => {
  it('should record the terminator of each line', () => {
    expect(splitLines('a\r\nb\nc')).toEqual({ lines: ['a', 'b', 'c'], terminators: ['\r\n', '\n', ''] });
  });

  it('should not add an empty line after a final terminator', () => {
    expect(splitLines('a\n\n').lines).toEqual(['a', '']);
  });

  it('should give no lines for empty text', () => {
    expect(splitLines('')).toEqual({ lines: [], terminators: [] });
  });
});

describe('joinLines', () => {
  it('should rebuild mixed line endings exactly', () => {
    const text = 'x\ny\r\n\r\nz';
    expect(joinLines(splitLines(text))).toBe(text);
  });
});
