import { describe, it, expect } from 'vitest';
import { deriveTargetPath, extensionOf } from './paths.js';

describe('deriveTargetPath', () => {
  it('should replace the extension', () => {
    expect(deriveTargetPath('notes.org', 'el')).toBe('notes.el');
    expect(deriveTargetPath('src/lib/core.org', '.clj')).toBe('src/lib/core.clj');
  });

  it('should replace only the last extension', () => {
    expect(deriveTargetPath('pkg.test.el', 'org')).toBe('pkg.test.org');
  });

  it('should append an extension when there is none', () => {
    expect(deriveTargetPath('README', 'el')).toBe('README.el');
  });
});

describe('extensionOf', () => {
  it('should lowercase and drop the dot', () => {
    expect(extensionOf('Notes.ORG')).toBe('org');
    expect(extensionOf('Makefile')).toBe('');
  });
});
