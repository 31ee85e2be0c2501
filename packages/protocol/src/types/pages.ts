// List response envelope

/**
 * Pagination metadata returned with every list response
 */
export type PageMeta = {
  /**
   * Path of the next page, or null on the last page
   */
  next: string | null;

  previous: string | null;
  limit: number | null;
  offset: number | null;

  /**
   * Number of matching records across all pages
   */
  totalCount: number | null;
};

/**
 * One page of a list response.
 *
 * Elements are left undecoded; the pagination engine decodes each one
 * with the decoder for the endpoint being walked.
 */
export type Page = {
  meta: PageMeta;
  objects: unknown[];
};
