/**
 * GridEngine stdio paths (`-o`, `-e`, `-i`) are a comma-separated list of
 * `[[host]:]path` alternatives with `$VAR` pseudo-variables. Slurm takes one
 * path per stream and uses `%` patterns instead.
 */

export interface PathTranslation {
  /** First usable alternative with placeholders rewritten, or null if none survived. */
  path: string | null;
  /** Host-qualified alternatives that were dropped. */
  skipped: string[];
}

const PLACEHOLDERS: ReadonlyArray<readonly [string, string]> = [
  ["USER", "%u"],
  ["JOB_ID", "%j"],
  ["JOB_NAME", "%x"],
  ["HOSTNAME", "%N"],
  ["TASK_ID", "%a"]
];

function isIdentChar(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z0-9_]/.test(ch);
}

/**
 * Splits on commas not preceded by a backslash and drops the escaping
 * backslashes.
 */
export function splitAlternatives(raw: string): string[] {
  const out: string[] = [];
  let current = "";
  for (let i = 0; i < raw.length; i++) {
    const ch = raw[i];
    if (ch === "\\" && i + 1 < raw.length) {
      current += raw[i + 1];
      i++;
    } else if (ch === ",") {
      out.push(current);
      current = "";
    } else {
      current += ch;
    }
  }
  out.push(current);
  return out;
}

export function substitutePlaceholders(path: string): string {
  let out = "";
  let i = 0;
  outer: while (i < path.length) {
    if (path[i] === "$") {
      for (const [name, replacement] of PLACEHOLDERS) {
        const braced = `\${${name}}`;
        if (path.startsWith(braced, i)) {
          out += replacement;
          i += braced.length;
          continue outer;
        }
        const bare = `$${name}`;
        if (path.startsWith(bare, i) && !isIdentChar(path[i + bare.length])) {
          out += replacement;
          i += bare.length;
          continue outer;
        }
      }
    }
    out += path[i];
    i++;
  }
  return out;
}

export function translateStdioPath(raw: string): PathTranslation {
  const skipped: string[] = [];

  for (const alternative of splitAlternatives(raw)) {
    let candidate: string;
    if (alternative.startsWith(":")) {
      candidate = alternative.slice(1);
    } else if (alternative.includes(":")) {
      skipped.push(alternative);
      continue;
    } else {
      candidate = alternative;
    }
    if (candidate.length === 0) continue;
    return { path: substitutePlaceholders(candidate), skipped };
  }

  return { path: null, skipped };
}
