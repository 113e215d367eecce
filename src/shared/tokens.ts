/** Rough token estimate: one token per four characters, rounded up. */
export function estimateTokens(text: string): number {
  if (text.length === 0) return 0;
  return Math.ceil(text.length / 4);
}

/** Percentage of tokens saved, one decimal place; 0 when nothing was there. */
export function savingsPercent(originalTokens: number, optimizedTokens: number): number {
  if (originalTokens <= 0) return 0;
  const saved = ((originalTokens - optimizedTokens) / originalTokens) * 100;
  return Math.round(saved * 10) / 10;
}
