import { describe, it, expect } from 'vitest';
import { TextBuffer } from './buffer.js';
import { Link } from './link.js';
import { findInitializer } from '../engine/registry.js';
import { makeConfiguration } from '../engine/configuration.js';
import { ConfigurationError, TransformError } from '../engine/errors.js';

function orgToEl() {
  const entry = findInitializer('org-to-el');
  if (!entry) throw new Error('org-to-el missing');
  return entry.create('notes.org', 'notes.el');
}

describe('Link', () => {
  it('should regenerate that from this', () => {
    const org = new TextBuffer('notes.org', 'Hello\n#+BEGIN_SRC emacs-lisp\n(foo)\n#+END_SRC\n');
    const el = new TextBuffer('notes.el');
    const report = new Link(org, el, orgToEl()).clone();

    expect(el.content).toBe(';; Hello\n#+BEGIN_SRC emacs-lisp\n(foo)\n#+END_SRC\n');
    expect(report).toEqual({ configuration: 'org-to-el', changed: true, lines: 4, issues: [] });
  });

  it('should report no change when that is current', () => {
    const org = new TextBuffer('notes.org', 'Hello');
    const el = new TextBuffer('notes.el', ';; Hello');
    expect(new Link(org, el, orgToEl()).clone().changed).toBe(false);
  });

  it('should reverse into the opposite link', () => {
    const org = new TextBuffer('notes.org', 'Hello');
    const el = new TextBuffer('notes.el', ';; Edited');
    const link = new Link(org, el, orgToEl());
    const back = link.reverse();

    expect(back.config.name).toBe('el-to-org');
    expect(back.thisBuffer).toBe(el);
    back.clone();
    expect(org.content).toBe('Edited');
  });

  it('should reject buffers that do not match the configuration', () => {
    const org = new TextBuffer('other.org', 'x');
    const el = new TextBuffer('notes.el');
    expect(() => new Link(org, el, orgToEl())).toThrow(ConfigurationError);
  });

  it('should leave that untouched when the transform fails', () => {
    const config = makeConfiguration({
      name: 'pathological',
      thisId: 'a',
      thatId: 'b',
      commentPrefix: '# ',
      regionStartPattern: 'START',
      regionEndPattern: 'END',
      direction: 'uncommented',
    });
    const source = new TextBuffer('a', 'text');
    const target = new TextBuffer('b', 'previous');
    const link = new Link(source, target, config);
    Object.defineProperty(source, 'content', {
      get() {
        throw new Error('buffer unreadable');
      },
    });

    expect(() => link.clone()).toThrow(TransformError);
    expect(() => link.clone()).toThrow('Transform "pathological" failed for buffer "a": buffer unreadable');
    expect(target.content).toBe('previous');
  });
});

describe('TextBuffer', () => {
  it('should split lines without a trailing empty line', () => {
    expect(new TextBuffer('b', 'a\nb\n').lines()).toEqual(['a', 'b']);
  });

  it('should have no lines when empty', () => {
    expect(new TextBuffer('b').lines()).toEqual([]);
  });

  it('should keep its path', () => {
    expect(new TextBuffer('b', '', '/tmp/b.org').path).toBe('/tmp/b.org');
  });
});
