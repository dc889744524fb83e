/**
 * Scanners for the value types GridEngine options carry. Each one reads the
 * span `[start, end)` of an immutable string and returns the typed value with
 * the index just past what it consumed, or `null` when the span does not hold
 * a value of that type.
 */

export interface Scanned<T> {
  value: T;
  end: number;
}

const BYTES_PER_MIB = 1048576n;
const MAX_MINUTES = 0xffffffffn;

const MEMORY_UNITS: Record<string, { base: bigint; power: bigint }> = {
  K: { base: 1024n, power: 1n },
  M: { base: 1024n, power: 2n },
  G: { base: 1024n, power: 3n },
  k: { base: 1000n, power: 1n },
  m: { base: 1000n, power: 2n },
  g: { base: 1000n, power: 3n }
};

export function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= "0" && ch <= "9";
}

function scanDigits(text: string, start: number, end: number): Scanned<bigint> | null {
  let i = start;
  while (i < end && isDigit(text[i])) i++;
  if (i === start) return null;
  return { value: BigInt(text.slice(start, i)), end: i };
}

/**
 * Signed integer prefix, like `strtol` without the whitespace skipping.
 */
export function scanInteger(text: string, start = 0, end = text.length): Scanned<number> | null {
  let i = start;
  let negative = false;
  if (i < end && (text[i] === "+" || text[i] === "-")) {
    negative = text[i] === "-";
    i++;
  }
  const digits = scanDigits(text, i, end);
  if (!digits) return null;
  const value = Number(negative ? -digits.value : digits.value);
  if (!Number.isSafeInteger(value)) return null;
  return { value, end: digits.end };
}

/**
 * `<n>[KMGkmg]` to whole MiB, rounded up. Upper-case units are binary, lower-case
 * decimal. A positive result below `floorMib` is raised to it.
 */
export function scanMemory(text: string, floorMib: number, start = 0, end = text.length): Scanned<number> | null {
  const digits = scanDigits(text, start, end);
  if (!digits) return null;

  let bytes = digits.value;
  let i = digits.end;
  const unit = i < end ? MEMORY_UNITS[text[i] ?? ""] : undefined;
  if (unit) {
    bytes *= unit.base ** unit.power;
    i++;
  }
  if (i !== end) return null;

  const mib = (bytes + BYTES_PER_MIB - 1n) / BYTES_PER_MIB;
  if (mib > BigInt(Number.MAX_SAFE_INTEGER)) return null;

  let value = Number(mib);
  if (value > 0 && value < floorMib) value = floorMib;
  return { value, end: i };
}

/**
 * GridEngine time specifier to whole minutes, rounded up: either a bare number
 * of seconds or exactly `H:M:S` where any of the three may be left empty
 * (`1::1` is one hour and one second).
 */
export function scanTime(text: string, start = 0, end = text.length): Scanned<number> | null {
  if (start >= end) return null;

  const parts = text.slice(start, end).split(":");
  let seconds: bigint;

  if (parts.length === 1) {
    const digits = scanDigits(text, start, end);
    if (!digits || digits.end !== end) return null;
    seconds = digits.value;
  } else if (parts.length === 3) {
    const fields: bigint[] = [];
    for (const part of parts) {
      if (part.length === 0) {
        fields.push(0n);
        continue;
      }
      const digits = scanDigits(part, 0, part.length);
      if (!digits || digits.end !== part.length) return null;
      fields.push(digits.value);
    }
    const [h = 0n, m = 0n, s = 0n] = fields;
    seconds = s + 60n * (m + 60n * h);
  } else {
    return null;
  }

  const minutes = (seconds + 59n) / 60n;
  if (minutes > MAX_MINUTES) return null;
  return { value: Number(minutes), end };
}

/**
 * Case-insensitive `TRUE`, `FALSE`, `1` or `0` spanning the whole range.
 */
export function scanBoolean(text: string, start = 0, end = text.length): Scanned<boolean> | null {
  const word = text.slice(start, end).toUpperCase();
  if (word === "TRUE" || word === "1") return { value: true, end };
  if (word === "FALSE" || word === "0") return { value: false, end };
  return null;
}
