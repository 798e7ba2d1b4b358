/** One shop, joined from the listing and detail tables */
export interface BusinessRecord {
  readonly name: string;
  /** Unique within a generated site; the store page lives at stores/<slug>/ */
  readonly slug: string;
  readonly mapLink?: string;
  readonly rating?: number;
  readonly reviewCount?: number;
  readonly category?: string;
  readonly address?: string;
  readonly status?: string;
  readonly hours?: string;
  readonly websiteUrl?: string;
  readonly phone?: string;
  readonly features: readonly string[];
  /** Only set when mapLink matched a detail row */
  readonly coverImageUrl?: string;
  /** Lowercased name, category, address and status for the client filter */
  readonly searchHaystack: string;
}
