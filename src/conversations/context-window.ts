/**
 * Join context entries into a summary of at most `maxBytes` UTF-8 bytes,
 * keeping the newest entries. When even the newest entry is too large, its
 * tail is kept.
 */
export function boundContext(entries: string[], maxBytes: number): string {
  const kept: string[] = [];
  let used = 0;

  for (let i = entries.length - 1; i >= 0; i--) {
    const cost = Buffer.byteLength(entries[i]) + (kept.length > 0 ? 1 : 0);
    if (used + cost > maxBytes) break;
    kept.unshift(entries[i]);
    used += cost;
  }

  if (kept.length === 0 && entries.length > 0) {
    return tailBytes(entries[entries.length - 1], maxBytes);
  }
  return kept.join('\n');
}

/**
 * The last `maxBytes` UTF-8 bytes of `text`, cut on a character boundary.
 */
export function tailBytes(text: string, maxBytes: number): string {
  const chars = Array.from(text);
  let used = 0;
  let start = chars.length;
  while (start > 0) {
    const size = Buffer.byteLength(chars[start - 1]);
    if (used + size > maxBytes) break;
    used += size;
    start -= 1;
  }
  return chars.slice(start).join('');
}

export const userEntry = (text: string) => `User: ${text}`;
export const assistantEntry = (text: string) => `AI: ${text}`;
