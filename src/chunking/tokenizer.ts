export interface Token {
  text: string;
  start: number;
  end: number;
}

/** Splits on whitespace, keeping char offsets into the source text. */
export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  for (const m of text.matchAll(/\S+/g)) {
    const start = m.index ?? 0;
    tokens.push({ text: m[0], start, end: start + m[0].length });
  }
  return tokens;
}
