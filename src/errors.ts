/**
 * Error types raised while scraping and assembling the book
 */

/**
 * A page is missing something the scraper cannot do without
 * (title, chapter identity) or the chapter chain is malformed.
 */
export class StructureError extends Error {
  constructor(
    message: string,
    /** URL of the page being processed, when known */
    public readonly url?: string,
  ) {
    super(url ? `${message} (${url})` : message);
    this.name = "StructureError";
  }
}

/** A request failed at the network level or returned a non-2xx status. */
export class FetchError extends Error {
  constructor(
    public readonly url: string,
    message: string,
    public readonly status?: number,
  ) {
    super(`Failed to fetch ${url}: ${message}`);
    this.name = "FetchError";
  }
}

/**
 * Get a printable message from anything thrown.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
