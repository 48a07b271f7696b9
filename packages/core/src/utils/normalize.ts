/**
 * Description normalization for keyword matching.
 *
 * Only case is folded. Whitespace and punctuation are kept so that
 * multi-word phrases such as "filter coffee" match exactly as written.
 *
 * @param raw - Raw description string
 * @returns Lowercased description for matching
 */
export function normalizeDescription(raw: string): string {
    return raw.toLowerCase();
}
