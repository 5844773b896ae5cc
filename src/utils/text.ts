const WORD_REGEX = /[\p{L}\p{N}]+(?:'[\p{L}]+)?/gu;

export function normalizeText(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/\t/g, " ").trim();
}

export function normalizeUtterance(text: string): string {
  return text.trim().toLowerCase();
}

/** Lowercased words of two or more characters, with a singular variant for plurals. */
export function tokenize(text: string): string[] {
  const words = text.toLowerCase().match(WORD_REGEX) ?? [];

  const tokens = new Set<string>();
  for (const word of words) {
    for (const variant of expandTokenVariants(word)) {
      tokens.add(variant);
    }
  }
  return [...tokens];
}

export function sharesAnyToken(queryTokens: Set<string>, targetTokens: Set<string>): boolean {
  for (const token of queryTokens) {
    if (targetTokens.has(token)) {
      return true;
    }
  }
  return false;
}

export function isBroadQueryIntent(query: string): boolean {
  return /\b(summary|summarize|overview|list|all|explain|describe|everything)\b/.test(
    query.toLowerCase(),
  );
}

export function truncateWithEllipsis(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }
  return `${text.slice(0, maxChars)}...`;
}

function expandTokenVariants(token: string): string[] {
  const trimmed = token.trim();
  if (trimmed.length < 2) {
    return [];
  }

  const variants = [trimmed];
  if (trimmed.length >= 4 && trimmed.endsWith("s") && !trimmed.endsWith("ss")) {
    variants.push(trimmed.slice(0, -1));
  }
  return variants;
}
