// ============================================
// CHARACTER TRUNCATION
// ============================================

const MAX_RESPONSE_LENGTH = 100000; // ~25k tokens (4 chars per token average)

export function truncateResponse(
  text: string,
  maxLength: number = MAX_RESPONSE_LENGTH
): string {
  if (text.length <= maxLength) {
    return text;
  }

  const truncatedChars = text.length - maxLength;

  return (
    text.slice(0, maxLength) +
    '\n\n' +
    '─────────────────────────────────────────\n' +
    `⚠️  RESPONSE TRUNCATED\n` +
    `Original length: ${text.length.toLocaleString('en-US')} characters\n` +
    `Truncated: ${truncatedChars.toLocaleString('en-US')} characters\n\n` +
    `💡 To reduce response size:\n` +
    `   • Request fewer fields (fields parameter)\n` +
    `   • Use a narrower filter or a lower limit\n` +
    '─────────────────────────────────────────'
  );
}

// ============================================
// FIELD SELECTION
// ============================================

/** Joins a field list for Trello's `fields` query parameter. */
export function fieldList(fields: readonly string[] | undefined, fallback: readonly string[]): string {
  return (fields && fields.length > 0 ? fields : fallback).join(',');
}
