/**
 * Walk the webserial's chapter chain and collect it into a book
 *
 * Each page links to the next one through a bold "Next Chapter" anchor; the
 * walk starts at the first chapter and stops at the page without one.
 */

import { Book } from "./book.js";
import { Chapter } from "./chapter.js";
import { StructureError } from "./errors.js";
import { createFetcher, fetchText } from "./http.js";
import { createLogger, type Logger } from "./logger.js";
import type { FetchFn } from "./types.js";
import { delay } from "./utils.js";

/** First chapter of SEEK, the seed of the chain */
export const FIRST_CHAPTER_URL = "https://seekwebserial.wordpress.com/2024/10/18/0-1-0-hack/";

const defaultLogger = createLogger("scrape");

/** Configuration options for the scraper */
export interface ScrapeOptions {
  /** Page to start from (default: first chapter of SEEK) */
  startUrl?: string;
  /** Fetch function used for every page request */
  fetch?: FetchFn;
  /** Delay between chapter requests (ms) */
  chapterDelay?: number;
  /** Called after each chapter has been added to the book */
  onChapter?: (chapter: Chapter, index: number) => void;
  logger?: Logger;
}

/**
 * Key under which a page counts as visited; fragments point into the same page.
 */
export function visitKey(url: string): string {
  const parsed = new URL(url);
  parsed.hash = "";
  return parsed.href;
}

/**
 * Follow "Next Chapter" links from the start URL until a page has none.
 * Chapters are grouped into arcs in the order they are found.
 *
 * @throws {FetchError} If a chapter page cannot be fetched
 * @throws {StructureError} If a page cannot be identified or the chain revisits a page
 */
export async function scrapeBook(options: ScrapeOptions = {}): Promise<Book> {
  const {
    startUrl = FIRST_CHAPTER_URL,
    fetch: fetchFn = createFetcher(),
    chapterDelay = 0,
    onChapter,
    logger = defaultLogger,
  } = options;

  const book = new Book();
  const visitedUrls = new Set<string>();
  let currentUrl: string | null = startUrl;
  let index = 0;

  while (currentUrl) {
    const key = visitKey(currentUrl);
    if (visitedUrls.has(key)) {
      throw new StructureError("Chapter chain loops back to an already scraped page", currentUrl);
    }
    visitedUrls.add(key);

    logger.info(`Scraping chapter from: ${currentUrl}`);
    const html = await fetchText(currentUrl, fetchFn);
    const chapter = Chapter.parse(currentUrl, html, logger);
    book.add(chapter);
    onChapter?.(chapter, index);

    currentUrl = chapter.nextUrl;
    index++;
    if (currentUrl && chapterDelay > 0) {
      await delay(chapterDelay);
    }
  }

  logger.info(`Scraped ${book.chapterCount} chapters in ${book.size} arcs`);
  return book;
}
