/**
 * Shared type definitions for the scraper and the EPUB assembler
 */

/** Fetch-compatible function used for every network request */
export type FetchFn = (url: string) => Promise<Response>;

/** Inclusive index range into a page's block elements */
export interface ContentRange {
  start: number;
  end: number;
}

/** Outcome of running boundary detection over one page's block elements */
export interface ExtractionResult {
  /** Range judged to be story content; the whole sequence when degraded */
  range: ContentRange;
  /** Sanitized clones of every retained element, rescued ones first */
  elements: Element[];
  /** Number of elements rescued from above the start marker for their images */
  rescued: number;
  /** Paragraph text of the retained elements, separated by blank lines */
  text: string;
  /** Query-stripped image URLs in first-seen order */
  imageUrls: string[];
  /** True when no navigation markers could be found and everything was kept */
  degraded: boolean;
}

/** Book-level metadata written into the package document */
export interface BookMetadata {
  identifier: string;
  title: string;
  language: string;
  creator: string;
  description: string;
  /** Publication date as YYYY-MM-DD */
  date: string;
}

/** A downloaded image stored inside the book */
export interface ImageEntry {
  /** Normalized remote URL (no query string) */
  url: string;
  /** Path inside the book, always under images/ */
  fileName: string;
  mediaType: string;
  data: Uint8Array;
}

/** One file of the assembled document */
export interface BookItem {
  id: string;
  /** Path relative to the package document */
  href: string;
  mediaType: string;
  content: string | Uint8Array;
}

/** Table of contents entry; arcs carry their chapters as children */
export interface TocEntry {
  title: string;
  href: string;
  children: TocEntry[];
}

/** Format-independent result of assembling a book */
export interface BookDocument {
  metadata: BookMetadata;
  /** All items in insertion order (pages, stylesheet, images) */
  items: BookItem[];
  /** Item ids in reading order */
  spine: string[];
  toc: TocEntry[];
}
