import { adjectives, animals, uniqueNamesGenerator } from 'unique-names-generator';

const SLUG_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)+$/;

/**
 * Lowercase, runs of anything but letters and digits become one hyphen
 */
export function toSlug(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

export function isServiceSlug(value: string): boolean {
  return SLUG_PATTERN.test(value) && value.length <= 63;
}

/**
 * Two-word slug such as `brave-otter`
 */
export function generateServiceName(): string {
  return toSlug(
    uniqueNamesGenerator({
      dictionaries: [adjectives, animals],
      separator: '-',
      length: 2,
    })
  );
}
