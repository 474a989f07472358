import { FIELD_TAGS } from '../enums/record-field.enum';

function tagPattern(tag: string): RegExp {
  return new RegExp(`<${tag}\\s*>([\\s\\S]*?)</${tag}\\s*>`, 'i');
}

const KNOWN_TAG_PATTERNS: RegExp[] = Object.values(FIELD_TAGS).map(tagPattern);

/**
 * Return the trimmed content of the first well-formed <tag>...</tag> pair,
 * or null when the pair is absent. Content may span lines.
 */
export function extractTagged(text: string, tag: string): string | null {
  const match = tagPattern(tag).exec(text);
  if (!match) {
    return null;
  }
  return match[1].trim();
}

/**
 * True when the text carries at least one recognised field tag pair.
 * Unrecognised tags do not count.
 */
export function hasFieldMarkup(text: string): boolean {
  return KNOWN_TAG_PATTERNS.some((pattern) => pattern.test(text));
}
