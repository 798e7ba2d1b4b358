/**
 * Slug derivation for store pages.
 *
 * Letters of any script are kept (store names are often not Latin), accents
 * are stripped, everything else collapses to single hyphens. Collisions get
 * -2, -3, ... in the order names are allocated.
 */

const FALLBACK_SLUG = 'shop';

/** Slugs become directory names, which most filesystems cap at 255 bytes */
export const MAX_SLUG_BYTES = 80;

function truncateUtf8(value: string, maxBytes: number): string {
  let bytes = 0;
  let result = '';
  for (const char of value) {
    bytes += Buffer.byteLength(char, 'utf8');
    if (bytes > maxBytes) break;
    result += char;
  }
  return result;
}

export function slugify(name: string): string {
  const token = name
    .normalize('NFKD')
    .replace(/\p{M}+/gu, '')
    .normalize('NFKC')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_]+/gu, '-')
    .replace(/^[-_]+|[-_]+$/g, '');

  const capped = truncateUtf8(token, MAX_SLUG_BYTES).replace(/[-_]+$/, '');
  return capped || FALLBACK_SLUG;
}

export type SlugAllocator = (name: string) => string;

export function createSlugAllocator(): SlugAllocator {
  const taken = new Set<string>();

  return (name: string): string => {
    const base = slugify(name);
    let slug = base;
    for (let suffix = 2; taken.has(slug); suffix++) {
      slug = `${base}-${suffix}`;
    }
    taken.add(slug);
    return slug;
  };
}
