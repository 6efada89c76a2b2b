import { describe, it, expect } from 'vitest';
import { applyLineRules, applyRules, DEFAULT_ORGEL_SETTINGS, escapeRegExp, orgelRules } from './overlay.js';

const forward = orgelRules(';; ', DEFAULT_ORGEL_SETTINGS, 'forward');
const reverse = orgelRules(';; ', DEFAULT_ORGEL_SETTINGS, 'reverse');

describe('orgel rules', () => {
  it('should turn a single-word heading into a named section', () => {
    expect(applyRules(';; * Foo', forward)).toBe(';;; Foo:');
  });

  it('should turn a named section back into a heading', () => {
    expect(applyRules(';; intro\n;;; Foo:', reverse)).toBe(';; intro\n;; * Foo');
  });

  it('should read a named section on the first line as the summary line', () => {
    expect(applyRules(';;; Foo:', reverse)).toBe(';; # # Foo:');
  });

  it('should rewrite the summary marker on the first line', () => {
    expect(applyRules(';; # # blah', forward)).toBe(';;; blah');
    expect(applyRules(';;; blah', reverse)).toBe(';; # # blah');
  });

  it('should only rewrite the summary marker before the first line break', () => {
    const text = 'first\n;; # # not a summary\n;;; also not';
    expect(applyRules(text, forward)).toBe(text);
    expect(applyRules(text, reverse)).toBe(text);
  });

  it('should leave multi-word headings alone', () => {
    expect(applyRules('x\n;; * Two Words', forward)).toBe('x\n;; * Two Words');
    expect(applyRules('x\n;;; Two Words:', reverse)).toBe('x\n;;; Two Words:');
  });

  it('should require a colon when reversing a heading', () => {
    expect(applyRules('x\n;;; Code', reverse)).toBe('x\n;;; Code');
  });

  it('should rewrite every matching heading line', () => {
    const text = ';; intro\n;; * Commentary\n;; body\n;; * Code\n(foo)\n';
    expect(applyRules(text, forward)).toBe(';; intro\n;;; Commentary:\n;; body\n;;; Code:\n(foo)\n');
  });

  it('should leave text without markers or headings unchanged', () => {
    const text = ';; plain prose\n(foo)\n;; more\n';
    expect(applyRules(text, forward)).toBe(text);
  });

  it('should keep carriage returns in place', () => {
    expect(applyRules(';; # # blah\r\n;; * Foo\r\n', forward)).toBe(';;; blah\r\n;;; Foo:\r\n');
  });

  it('should treat the comment prefix literally', () => {
    const rules = orgelRules('-- ', { summaryMarker: '--- ', headingPrefix: '--- $' }, 'forward');
    expect(applyRules('-- # # title\n-- * Part', rules)).toBe('--- title\n--- $Part:');
  });
});

describe('applyLineRules', () => {
  it('should only touch eligible lines', () => {
    const lines = [';; * Intro', ';; * Inside', ';; * Outro'];
    expect(applyLineRules(lines, forward, i => i !== 1)).toEqual([';;; Intro:', ';; * Inside', ';;; Outro:']);
  });
});

describe('escapeRegExp', () => {
  it('should escape regex metacharacters', () => {
    expect(new RegExp(escapeRegExp('a.b*(c)')).test('a.b*(c)')).toBe(true);
    expect(new RegExp(`^${escapeRegExp('a.b')}$`).test('axb')).toBe(false);
  });
});
