import type { Scanned } from "./tokens.js";

export const COMMENT_MARKER = "#";
export const DIRECTIVE_INTRODUCER = "$";

export interface DirectiveLine {
  /** 1-based physical line in the script. */
  line: number;
  /** Text after the `#$` marker, without the line terminator. */
  body: string;
}

/**
 * Collects the `#$` lines from the leading comment block of a job script. The
 * block ends at the first line that does not start with `#`; comment lines
 * that are not directives still count towards the line numbers.
 */
export function scanDirectiveLines(script: string): DirectiveLine[] {
  const out: DirectiveLine[] = [];
  let pos = 0;
  let line = 0;

  while (pos < script.length && script[pos] === COMMENT_MARKER) {
    let eol = script.indexOf("\n", pos);
    if (eol < 0) eol = script.length;
    line++;

    let text = script.slice(pos, eol);
    if (text.endsWith("\r")) text = text.slice(0, -1);
    if (text[1] === DIRECTIVE_INTRODUCER) {
      out.push({ line, body: text.slice(2) });
    }
    pos = eol + 1;
  }
  return out;
}

export function isSpace(ch: string | undefined): boolean {
  return ch === " " || ch === "\t" || ch === "\v" || ch === "\f" || ch === "\r" || ch === "\n";
}

/** Whitespace or any other control character. */
export function isBlankOrControl(ch: string | undefined): boolean {
  if (ch === undefined) return false;
  const code = ch.charCodeAt(0);
  return code <= 0x20 || code === 0x7f;
}

export function skipSpaces(text: string, pos: number): number {
  let i = pos;
  while (i < text.length && isSpace(text[i])) i++;
  return i;
}

/**
 * Reads the next token after optional whitespace. The token ends at a
 * whitespace/control character or at any character in `stopChars`. Returns
 * null when the token would be empty.
 */
export function readToken(text: string, pos: number, stopChars = ""): Scanned<string> | null {
  const start = skipSpaces(text, pos);
  let i = start;
  while (i < text.length) {
    const ch = text[i];
    if (isBlankOrControl(ch) || (ch !== undefined && stopChars.includes(ch))) break;
    i++;
  }
  if (i === start) return null;
  return { value: text.slice(start, i), end: i };
}

/**
 * Like `readToken`, but a backslash keeps the following character (including
 * whitespace) in the token. The backslashes are preserved in the result so the
 * caller can still tell escaped delimiters apart.
 */
export function readEscapedToken(text: string, pos: number): Scanned<string> | null {
  const start = skipSpaces(text, pos);
  let i = start;
  while (i < text.length && !isBlankOrControl(text[i])) {
    i += text[i] === "\\" && i + 1 < text.length ? 2 : 1;
  }
  if (i === start) return null;
  return { value: text.slice(start, i), end: i };
}
