/**
 * Escape decoding for variant values
 */

import { NotationError } from './errors.js';

// \vs{N} and its named aliases, U+FE00..U+FE0F
const VARIATION_SELECTORS: Record<string, string> = {
  text: '\u{fe0e}',
  emoji: '\u{fe0f}',
};
for (let n = 1; n <= 16; n++) {
  VARIATION_SELECTORS[String(n)] = String.fromCodePoint(0xfe00 + n - 1);
}

// \c{...}
const COMBINING: Record<string, string> = {
  not: '\u{0338}',
};

const HEX = /^[0-9a-fA-F]+$/;

/**
 * Split `tag}rest` at the first closing brace
 */
function closeBrace(rest: string, escape: string): [string, string] {
  const end = rest.indexOf('}');
  if (end === -1) {
    throw new NotationError('UnterminatedEscape', `unclosed escape: \\${escape}{${rest}`);
  }
  return [rest.slice(0, end), rest.slice(end + 1)];
}

function decodeCodepoint(code: string): string {
  if (!HEX.test(code)) {
    throw new NotationError('InvalidCodepoint', `invalid Unicode escape \\u{${code}}`);
  }
  const n = parseInt(code, 16);
  if (n > 0x10ffff || (n >= 0xd800 && n <= 0xdfff)) {
    throw new NotationError('InvalidCodepoint', `invalid Unicode escape \\u{${code}}`);
  }
  return String.fromCodePoint(n);
}

function lookupTag(table: Record<string, string>, escape: string, tag: string): string {
  if (!Object.prototype.hasOwnProperty.call(table, tag)) {
    throw new NotationError('InvalidEscape', `invalid escape: \\${escape}{${tag}}`);
  }
  return table[tag];
}

/**
 * Decode a raw value token, expanding `\u{XXXX}`, `\vs{...}` and `\c{...}`
 */
export function decodeValue(raw: string): string {
  let result = '';
  let text = raw;

  while (text.length > 0) {
    const slash = text.indexOf('\\');
    if (slash === -1) {
      result += text;
      break;
    }

    result += text.slice(0, slash);
    text = text.slice(slash);

    let tag: string;
    if (text.startsWith('\\u{')) {
      [tag, text] = closeBrace(text.slice(3), 'u');
      result += decodeCodepoint(tag);
    } else if (text.startsWith('\\vs{')) {
      [tag, text] = closeBrace(text.slice(4), 'vs');
      result += lookupTag(VARIATION_SELECTORS, 'vs', tag);
    } else if (text.startsWith('\\c{')) {
      [tag, text] = closeBrace(text.slice(3), 'c');
      result += lookupTag(COMBINING, 'c', tag);
    } else {
      throw new NotationError('InvalidEscape', `invalid escape sequence: ${text}`);
    }
  }

  return result;
}
