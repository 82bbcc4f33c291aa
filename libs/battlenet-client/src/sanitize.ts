const OWNER_PLACEHOLDER = '_';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Replaces the value of every `"field": "..."` string member in a raw JSON
 * document with `placeholder`, before the document is parsed.
 *
 * The value ends at the first quote followed by `,` or `}`. Backslashes inside
 * the original value carry no meaning, so neither an escaped quote nor a stray
 * trailing backslash moves the end of the match.
 */
export function sanitizeStringField(text: string, field: string, placeholder: string): string {
  const pattern = new RegExp(`"${escapeRegExp(field)}"(\\s*):(\\s*)"[\\s\\S]*?"(?=\\s*[,}])`, 'g');
  const replacement = JSON.stringify(placeholder);
  return text.replace(
    pattern,
    (_match, before: string, after: string) => `"${field}"${before}:${after}${replacement}`,
  );
}

/**
 * Auction listings frequently carry invalid text in `owner`, which this client
 * never reads.
 */
export function sanitizeAuctionOwners(text: string): string {
  return sanitizeStringField(text, 'owner', OWNER_PLACEHOLDER);
}
