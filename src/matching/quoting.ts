/**
 * Quote-aware scanning of shell text. Nothing here tokenizes fully; it only
 * answers "is this character live shell syntax?" for the normalizer and the
 * safety classifier.
 */

export interface QuotingMap {
  /** False when a quote, backtick or parenthesis is left open (or closed too often). */
  balanced: boolean;
  /** Character is outside quotes/backticks and not escaped. */
  unquoted: boolean[];
  /** Unquoted and not nested inside parentheses; parentheses themselves are not top level. */
  topLevel: boolean[];
}

export function analyzeQuoting(text: string): QuotingMap {
  const unquoted = new Array<boolean>(text.length).fill(false);
  const topLevel = new Array<boolean>(text.length).fill(false);
  let inSingle = false;
  let inDouble = false;
  let inBacktick = false;
  let depth = 0;
  let balanced = true;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inSingle) {
      if (ch === "'") inSingle = false;
      continue;
    }
    if (ch === "\\") {
      i++; // escaped character is never syntax
      continue;
    }
    if (inDouble) {
      if (ch === '"') inDouble = false;
      continue;
    }
    if (inBacktick) {
      if (ch === "`") inBacktick = false;
      continue;
    }

    if (ch === "'") {
      inSingle = true;
      continue;
    }
    if (ch === '"') {
      inDouble = true;
      continue;
    }
    if (ch === "`") {
      inBacktick = true;
      continue;
    }

    unquoted[i] = true;
    if (ch === "(") {
      depth++;
    } else if (ch === ")") {
      depth--;
      if (depth < 0) {
        balanced = false;
        depth = 0;
      }
    } else if (depth === 0) {
      topLevel[i] = true;
    }
  }

  if (inSingle || inDouble || inBacktick || depth !== 0) balanced = false;
  return { balanced, unquoted, topLevel };
}

/**
 * Index of the parenthesis closing the one at `open`, honoring quotes, or -1.
 */
export function matchingParen(text: string, open: number): number {
  if (text[open] !== "(") return -1;
  const { unquoted } = analyzeQuoting(text);
  let depth = 0;
  for (let i = open; i < text.length; i++) {
    if (!unquoted[i]) continue;
    if (text[i] === "(") depth++;
    else if (text[i] === ")") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * Read a quoted word starting at `start` (which must be a quote character).
 * Returns the unescaped body and the index just past the closing quote.
 */
export function readQuoted(text: string, start: number): { body: string; end: number } | null {
  const quote = text[start];
  if (quote !== "'" && quote !== '"') return null;

  let body = "";
  for (let i = start + 1; i < text.length; i++) {
    const ch = text[i];
    if (quote === '"' && ch === "\\" && i + 1 < text.length) {
      const next = text[i + 1];
      // Inside double quotes only these are escapable; keep the backslash otherwise.
      body += next === '"' || next === "\\" || next === "$" || next === "`" ? next : ch + next;
      i++;
      continue;
    }
    if (ch === quote) return { body, end: i + 1 };
    body += ch;
  }
  return null;
}
