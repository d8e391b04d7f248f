/**
 * Text helpers shared by error messages and output formatting.
 * Lengths are in code points so that truncation never splits a surrogate pair.
 */

const ESCAPES: Record<string, string> = {
  '\\': '\\\\',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
};

/**
 * Render text as a single-line quoted literal.
 *
 * Single quotes are used unless the text contains a single quote and no double quote.
 * Backslashes, the chosen quote and control characters are escaped.
 */
export function quoteText(text: string): string {
  const quote = text.includes("'") && !text.includes('"') ? '"' : "'";
  let body = '';
  for (const char of text) {
    const escape = ESCAPES[char];
    if (escape !== undefined) {
      body += escape;
    } else if (char === quote) {
      body += `\\${quote}`;
    } else if (isControl(char)) {
      body += `\\x${char.charCodeAt(0).toString(16).padStart(2, '0')}`;
    } else {
      body += char;
    }
  }
  return `${quote}${body}${quote}`;
}

function isControl(char: string): boolean {
  const code = char.charCodeAt(0);
  return code < 0x20 || code === 0x7f;
}

export function codePointLength(text: string): number {
  return Array.from(text).length;
}

/** First `count` code points of `text` */
export function headOf(text: string, count: number): string {
  return Array.from(text).slice(0, count).join('');
}

/** Last `count` code points of `text` */
export function tailOf(text: string, count: number): string {
  return count <= 0 ? '' : Array.from(text).slice(-count).join('');
}
