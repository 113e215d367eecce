// --- argument inspection ---

/** Whitespace tokens of a command, lowercased. */
export function tokens(command: string): string[] {
  return command.toLowerCase().split(/\s+/).filter((t) => t.length > 0);
}

/**
 * True when a token equals one of `flags`; long options also match in
 * `--flag=value` form.
 */
export function hasFlag(command: string, flags: readonly string[]): boolean {
  return command
    .split(/\s+/)
    .some((word) => flags.some((flag) => word === flag || (flag.startsWith("--") && word.startsWith(`${flag}=`))));
}

// --- line helpers ---

export function nonEmptyTrimmedLines(text: string): string[] {
  return text
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/** First `max` lines, then `...+N more (T total)` on its own line. */
export function capLines(lines: readonly string[], max: number, noun = ""): string {
  if (lines.length <= max) return lines.join("\n");
  const more = noun ? `more ${noun}` : "more";
  return [...lines.slice(0, max), `...+${lines.length - max} ${more} (${lines.length} total)`].join("\n");
}

/** Appends up to `max` items and a `+N more` tail to a comma list. */
export function commaList(items: readonly string[], max: number): string {
  const shown = items.slice(0, max).join(", ");
  return items.length > max ? `${shown}, +${items.length - max} more` : shown;
}

/** Up to `max` lines under a heading, then `...+N more <noun>`. */
export function section(heading: string | null, lines: readonly string[], max: number, noun: string): string[] {
  if (lines.length === 0) return [];
  const out = heading ? [heading] : [];
  out.push(...lines.slice(0, max));
  if (lines.length > max) out.push(`...+${lines.length - max} more ${noun}`);
  return out;
}

/** Cuts a string to at most `max` characters. */
export function clip(text: string, max: number): string {
  return text.length <= max ? text : text.slice(0, max);
}
