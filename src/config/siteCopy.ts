/**
 * Visible text of the generated pages.
 *
 * Placeholders in braces ({count}, {name}, {sources}) are filled by
 * formatCopy().
 */

export interface SiteCopy {
  lang: string;
  title: string;
  intro: string;
  searchLabel: string;
  searchPlaceholder: string;
  categoryLabel: string;
  allCategories: string;
  defaultCategory: string;
  noRating: string;
  reviewCount: string;
  addressMissing: string;
  viewShop: string;
  viewShopLabel: string;
  openMap: string;
  openMapLong: string;
  visitWebsite: string;
  callPhone: string;
  backToList: string;
  aboutHeading: string;
  addressLabel: string;
  statusLabel: string;
  statusMissing: string;
  hoursLabel: string;
  phoneLabel: string;
  notProvided: string;
  photoHeading: string;
  noImage: string;
  imageAlt: string;
  linksHeading: string;
  shopCount: string;
  sourceNote: string;
  generatedNote: string;
}

export const DEFAULT_SITE_COPY: SiteCopy = {
  lang: 'en',
  title: 'Pet Grooming Directory',
  intro:
    'Every shop gets its own page with ratings, address, opening hours and map links, so you can find the right groomer quickly.',
  searchLabel: 'Search',
  searchPlaceholder: 'Search by name, address or status...',
  categoryLabel: 'Filter',
  allCategories: 'All categories',
  defaultCategory: 'Pet grooming',
  noRating: 'No rating yet',
  reviewCount: '({count} reviews)',
  addressMissing: 'Address not provided',
  viewShop: 'View shop',
  viewShopLabel: 'Open the page for {name}',
  openMap: 'Google Maps',
  openMapLong: 'View on Google Maps',
  visitWebsite: 'Website / social',
  callPhone: 'Call',
  backToList: '← Back to all shops',
  aboutHeading: 'About this shop',
  addressLabel: 'Address',
  statusLabel: 'Status',
  statusMissing: 'Call ahead',
  hoursLabel: 'Hours',
  phoneLabel: 'Phone',
  notProvided: 'Not provided',
  photoHeading: 'Photo',
  noImage: 'No image yet',
  imageAlt: '{name} storefront or portfolio',
  linksHeading: 'Quick links',
  shopCount: '{count} shops listed.',
  sourceNote: 'Data from {sources}.',
  generatedNote: 'Pages generated automatically.',
};

export function formatCopy(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => {
    const value = values[key];
    return value === undefined ? match : String(value);
  });
}
