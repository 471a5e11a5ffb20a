/* ------------------------------------------------------------------
 * string.ts  •  String escaping and key ordering
 * ------------------------------------------------------------------
 *  ▸ escapeString(s)        – quoted, ASCII-only JSON string
 *  ▸ compareCodePoints(a,b) – ordinal comparator for object keys
 * ------------------------------------------------------------------ */

/** Printable ASCII minus `"` and `\` – emitted as-is */
const PLAIN_RX = /^[\x20\x21\x23-\x5b\x5d-\x7e]*$/;

/**
 * Quote a string. Printable ASCII (0x20–0x7E) is literal, `"` and `\`
 * get a backslash, everything else becomes `\uXXXX` with lowercase hex,
 * one escape per UTF-16 code unit. The result is pure ASCII.
 *
 * @example
 * ```typescript
 * escapeString("über €")  // '"\\u00fcber \\u20ac"'
 * escapeString("a/b")     // '"a/b"'
 * ```
 */
export function escapeString(value: string): string {
  if (PLAIN_RX.test(value)) return `"${value}"`;

  let out = '"';
  for (let i = 0; i < value.length; i++) {
    const unit = value.charCodeAt(i);
    if (unit === 0x22) {
      out += '\\"';
    } else if (unit === 0x5c) {
      out += "\\\\";
    } else if (unit >= 0x20 && unit <= 0x7e) {
      out += value[i];
    } else {
      out += "\\u" + unit.toString(16).padStart(4, "0");
    }
  }
  return out + '"';
}

/**
 * Map a UTF-16 code unit so that plain numeric comparison of the result
 * follows code-point order: surrogates (0xD800–0xDFFF) move above the
 * 0xE000–0xFFFF block, which moves down to make room.
 */
function codePointRank(unit: number): number {
  if (unit >= 0xd800 && unit <= 0xdfff) return unit + 0x2000;
  if (unit >= 0xe000) return unit - 0x800;
  return unit;
}

/**
 * Compare two strings by Unicode code point, which is also UTF-8 byte
 * order. Differs from `Array.prototype.sort`'s default only when a
 * supplementary-plane character meets one in U+E000–U+FFFF.
 */
export function compareCodePoints(a: string, b: string): number {
  const len = Math.min(a.length, b.length);
  for (let i = 0; i < len; i++) {
    const x = a.charCodeAt(i);
    const y = b.charCodeAt(i);
    if (x !== y) return codePointRank(x) - codePointRank(y);
  }
  return a.length - b.length;
}
