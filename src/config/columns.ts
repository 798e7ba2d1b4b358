/**
 * Source column mapping
 *
 * Column names are the contract with the scraper export. The defaults are
 * the Google Maps result-list classes the listing scrape produces; the
 * detail scrape shares the map link column with it.
 */

export interface ListingColumns {
  name: string;
  mapLink: string;
  rating: string;
  reviews: string;
  category: string;
  address: string;
  status: string;
  hours: string;
  website: string;
  phone: string;
  features: readonly string[];
}

export interface DetailColumns {
  mapLink: string;
  image: string;
}

export interface ColumnMap {
  listing: ListingColumns;
  detail: DetailColumns;
}

export const DEFAULT_COLUMNS: ColumnMap = {
  listing: {
    name: 'qBF1Pd',
    mapLink: 'hfpxzc href',
    rating: 'MW4etd',
    reviews: 'UY7F9',
    category: 'W4Efsd',
    address: 'W4Efsd (3)',
    status: 'W4Efsd (4)',
    hours: 'W4Efsd (5)',
    website: 'lcr4fd href',
    phone: 'UsdlK',
    features: ['ah5Ghc', 'ah5Ghc (2)'],
  },
  detail: {
    mapLink: 'hfpxzc href',
    image: 'aoRNLd src',
  },
};

/** Listing columns without which no record can be built */
export function requiredListingColumns(columns: ListingColumns): string[] {
  return [columns.name];
}

export function requiredDetailColumns(columns: DetailColumns): string[] {
  return [columns.mapLink, columns.image];
}
