/**
 * TextBuffer
 *
 * A named, mutable text container, optionally backed by a file. Content is
 * only ever replaced wholesale.
 */

import { splitLines } from '../engine/text.js';

export class TextBuffer {
  readonly name: string;
  readonly path?: string;
  private text: string;

  constructor(name: string, content = '', path?: string) {
    this.name = name;
    this.path = path;
    this.text = content;
  }

  get content(): string {
    return this.text;
  }

  lines(): string[] {
    return splitLines(this.text).lines;
  }

  replaceContent(text: string): boolean {
    if (text === this.text) return false;
    this.text = text;
    return true;
  }
}
