/**
 * Slug generation for jam URLs: `name-venue-YYYY-MM-DD`
 */

export const MAX_SLUG_LENGTH = 100;

/**
 * Lowercase, drop non-word characters, collapse whitespace/hyphen runs.
 */
export function cleanTextForSlug(text: string): string {
  if (!text) return '';

  return text
    .toLowerCase()
    .replace(/[^\w\s-]/g, '')
    .replace(/[-\s]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

export function generateJamSlug(name: string, venue?: string | null, jamDate?: string | null): string {
  const parts = [cleanTextForSlug(name)];

  if (venue && venue.trim()) {
    parts.push(cleanTextForSlug(venue));
  }

  if (jamDate) {
    parts.push(jamDate);
  }

  let slug = parts.filter(part => part.length > 0).join('-');

  if (slug.length > MAX_SLUG_LENGTH) {
    slug = slug.slice(0, MAX_SLUG_LENGTH);
    const lastHyphen = slug.lastIndexOf('-');
    if (lastHyphen > 0) {
      slug = slug.slice(0, lastHyphen);
    }
  }

  return slug;
}

/**
 * Append -1, -2, ... until the slug no longer collides.
 */
export function makeSlugUnique(baseSlug: string, existingSlugs: Iterable<string>): string {
  const taken = new Set(existingSlugs);
  if (!taken.has(baseSlug)) return baseSlug;

  let counter = 1;
  while (taken.has(`${baseSlug}-${counter}`)) {
    counter++;
  }
  return `${baseSlug}-${counter}`;
}
