/**
 * Configuration Registry
 *
 * Named initializers for the built-in links. Each takes the identifiers of
 * both buffers; deriving a target path from a source path is the caller's job.
 */

import { makeConfiguration, type Configuration, type ConfigurationInit } from './configuration.js';

export type Initializer = (thisId: string, thatId: string) => Configuration;

export interface InitializerEntry {
  name: string;
  description: string;
  /** Extension of the file read from, without the dot. */
  sourceExtension: string;
  /** Extension of the file written to, without the dot. */
  targetExtension: string;
  create: Initializer;
}

type Template = Omit<ConfigurationInit, 'name' | 'thisId' | 'thatId'>;

const ELISP_BLOCK = {
  commentPrefix: ';; ',
  regionStartPattern: '^#\\+BEGIN_SRC emacs-lisp',
  regionEndPattern: '^#\\+END_SRC',
};

// lowercase `#+begin_src clojure` can appear as a literal inside Clojure code
const CLOJURE_BLOCK = {
  commentPrefix: ';; ',
  regionStartPattern: '^#\\+BEGIN_SRC clojure',
  regionEndPattern: '^#\\+END_SRC',
  caseSensitive: true,
};

function entry(
  name: string,
  description: string,
  sourceExtension: string,
  targetExtension: string,
  template: Template
): InitializerEntry {
  return {
    name,
    description,
    sourceExtension,
    targetExtension,
    create: (thisId, thatId) => makeConfiguration({ ...template, name, thisId, thatId }),
  };
}

const BUILT_IN: readonly InitializerEntry[] = [
  entry('org-to-el', 'Org document to Emacs Lisp source', 'org', 'el', {
    ...ELISP_BLOCK,
    direction: 'uncommented',
  }),
  entry('el-to-org', 'Emacs Lisp source to Org document', 'el', 'org', {
    ...ELISP_BLOCK,
    direction: 'commented',
  }),
  entry('org-to-orgel', 'Org document to annotated Emacs Lisp (summary line and section headers)', 'org', 'el', {
    ...ELISP_BLOCK,
    direction: 'uncommented',
    overlay: { kind: 'orgel' },
  }),
  entry('orgel-to-org', 'Annotated Emacs Lisp to Org document', 'el', 'org', {
    ...ELISP_BLOCK,
    direction: 'commented',
    overlay: { kind: 'orgel' },
  }),
  entry('org-to-clojure', 'Org document to Clojure source', 'org', 'clj', {
    ...CLOJURE_BLOCK,
    direction: 'uncommented',
  }),
  entry('clojure-to-org', 'Clojure source to Org document', 'clj', 'org', {
    ...CLOJURE_BLOCK,
    direction: 'commented',
  }),
];

export function listInitializers(): readonly InitializerEntry[] {
  return BUILT_IN;
}

export function findInitializer(name: string): InitializerEntry | undefined {
  return BUILT_IN.find(e => e.name === name);
}

/**
 * Build an entry from a complete configuration template, as the config file does.
 */
export function defineInitializer(
  name: string,
  description: string,
  sourceExtension: string,
  targetExtension: string,
  template: Template
): InitializerEntry {
  makeConfiguration({ ...template, name, thisId: `source.${sourceExtension}`, thatId: `target.${targetExtension}` });
  return entry(name, description, sourceExtension, targetExtension, template);
}
