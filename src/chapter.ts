/**
 * One chapter page of the webserial, parsed once and immutable afterwards
 */

import { parseHTML } from "linkedom";
import { StructureError } from "./errors.js";
import { BLOCK_SELECTOR, extractContent, NEXT_CHAPTER, PREVIOUS_CHAPTER } from "./extract.js";
import { createLogger, type Logger } from "./logger.js";
import { countWords, resolveUrl } from "./utils.js";
import { serializeChildren } from "./xhtml.js";

/** WordPress wraps the post body in this container */
export const CONTENT_SELECTOR = "div.entry-content";

const defaultLogger = createLogger("chapter");

/** Display name and arc label derived from the page title */
export interface ChapterIdentity {
  name: string;
  arc: string;
}

/**
 * Derive chapter name and arc from a page title such as
 * `"0.1.0 – Hack – SEEK"`, split on whitespace: the first token is the chapter
 * number, the third the arc.
 *
 * Chapters of the first arc are numbered with a trailing "0" on the site where
 * the book uses the letter "O", so a trailing "0" is rewritten.
 *
 * @throws {StructureError} If the title is missing or has fewer than three tokens
 *
 * @example
 * parseChapterTitle('0.1.0 – Hack – SEEK') // { name: '0.1.O', arc: 'Hack' }
 */
export function parseChapterTitle(title: string | null | undefined, url?: string): ChapterIdentity {
  if (!title) {
    throw new StructureError("Page has no title", url);
  }
  const tokens = title.trim().split(/\s+/);
  if (tokens.length < 3) {
    throw new StructureError(`Cannot derive chapter and arc from title "${title.trim()}"`, url);
  }

  let name = tokens[0].toUpperCase();
  if (name.endsWith("0")) {
    name = `${name.slice(0, -1)}O`;
  }
  return { name, arc: tokens[2] };
}

/**
 * Find the href of the first anchor whose `<strong>` reads `label`,
 * resolved against the page URL.
 *
 * @returns Absolute URL, or null if the page has no such link
 */
export function findNavigationLink(document: Document, label: string, pageUrl: string): string | null {
  for (const anchor of Array.from(document.querySelectorAll("a"))) {
    if (anchor.querySelector("strong")?.textContent !== label) continue;
    const href = anchor.getAttribute("href");
    if (href) {
      return resolveUrl(href, pageUrl);
    }
  }
  return null;
}

interface ChapterFields {
  url: string;
  name: string;
  arc: string;
  previousUrl: string | null;
  nextUrl: string | null;
  content: Element;
  text: string;
  imageUrls: string[];
  degraded: boolean;
}

export class Chapter {
  /** Canonical URL of the page; also the chapter's identity */
  readonly url: string;
  /** Display name, e.g. "1.4" */
  readonly name: string;
  readonly arc: string;
  readonly previousUrl: string | null;
  readonly nextUrl: string | null;
  /** Detached `div.chapter-content` holding the sanitized story blocks */
  readonly content: Element;
  readonly text: string;
  readonly imageUrls: readonly string[];
  readonly wordCount: number;
  /** True when the content container or the navigation markers were missing */
  readonly degraded: boolean;

  private constructor(fields: ChapterFields) {
    this.url = fields.url;
    this.name = fields.name;
    this.arc = fields.arc;
    this.previousUrl = fields.previousUrl;
    this.nextUrl = fields.nextUrl;
    this.content = fields.content;
    this.text = fields.text;
    this.imageUrls = fields.imageUrls;
    this.wordCount = countWords(fields.text);
    this.degraded = fields.degraded;
  }

  /**
   * Parse a fetched chapter page.
   *
   * @param url - URL the page was fetched from
   * @param html - Raw page markup
   * @throws {StructureError} If the title does not identify the chapter
   */
  static parse(url: string, html: string, logger: Logger = defaultLogger): Chapter {
    const { document } = parseHTML(html);
    const { name, arc } = parseChapterTitle(document.querySelector("title")?.textContent, url);

    const content = document.createElement("div");
    content.setAttribute("class", "chapter-content");

    const fields: ChapterFields = {
      url,
      name,
      arc,
      previousUrl: findNavigationLink(document, PREVIOUS_CHAPTER, url),
      nextUrl: findNavigationLink(document, NEXT_CHAPTER, url),
      content,
      text: "",
      imageUrls: [],
      degraded: true,
    };

    logger.info(`Extracting content from ${name}`);
    const container = document.querySelector(CONTENT_SELECTOR);
    if (!container) {
      logger.warn(`No content div found in ${url}`);
      return new Chapter(fields);
    }

    const extraction = extractContent(Array.from(container.querySelectorAll(BLOCK_SELECTOR)), logger);
    for (const element of extraction.elements) {
      content.appendChild(element);
    }

    return new Chapter({
      ...fields,
      text: extraction.text,
      imageUrls: extraction.imageUrls,
      degraded: extraction.degraded,
    });
  }

  /** Chapters are the same chapter when they come from the same URL */
  equals(other: Chapter): boolean {
    return this.url === other.url;
  }

  /** Compare extracted content regardless of where it came from */
  contentEquals(other: Chapter): boolean {
    return serializeChildren(this.content) === serializeChildren(other.content);
  }
}
