/**
 * Parses a struct tag (space-separated key:"value" pairs) into a record.
 *
 * Keys are separated by whitespace and every value is double-quoted;
 * `\"` and `\\` escapes are honoured inside values. When a key repeats,
 * the first occurrence wins.
 *
 * Example input:
 * ```
 * validate:"required,email" json:"email_address,omitempty"
 * ```
 *
 * Returns:
 * ```
 * { validate: "required,email", json: "email_address,omitempty" }
 * ```
 */
export function parseTag(tagText: string): Record<string, string> {
  const tags = new Map<string, string>();

  const tagPattern = /([^\s:"]+):"((?:[^"\\]|\\.)*)"/g;
  let match: RegExpExecArray | null;

  while ((match = tagPattern.exec(tagText)) !== null) {
    const key = match[1]!;
    const value = match[2]!.replace(/\\(.)/g, "$1");

    if (!tags.has(key)) {
      tags.set(key, value);
    }
  }

  return Object.fromEntries(tags);
}

/** Value of one key in a struct tag, or undefined when absent */
export function tagLookup(tagText: string, key: string): string | undefined {
  const tags = parseTag(tagText);
  return Object.hasOwn(tags, key) ? tags[key] : undefined;
}
