/**
 * Fixture builders shared by the test files
 */

import { parseHTML } from "linkedom";
import { type Mock, vi } from "vitest";
import { Chapter, CONTENT_SELECTOR } from "./chapter.js";
import { BLOCK_SELECTOR } from "./extract.js";
import type { Logger } from "./logger.js";

/** Paragraph holding bold navigation links, as the site renders them */
export function navParagraph(links: { previous?: string; next?: string }): string {
  const parts: string[] = [];
  if (links.previous !== undefined) {
    parts.push(`<a href="${links.previous}"><strong>Previous Chapter</strong></a>`);
  }
  if (links.next !== undefined) {
    parts.push(`<a href="${links.next}"><strong>Next Chapter</strong></a>`);
  }
  return `<p>${parts.join(" | ")}</p>`;
}

/** Full chapter page with the given title and post body */
export function chapterPage(title: string, body: string): string {
  return [
    "<!DOCTYPE html>",
    `<html><head><title>${title}</title></head>`,
    '<body><header><a href="/">Home</a></header>',
    `<article><div class="entry-content">${body}</div></article>`,
    "<footer><p>Powered by WordPress</p></footer>",
    "</body></html>",
  ].join("");
}

/** Block elements of a post body, in document order */
export function blocks(body: string): Element[] {
  const { document } = parseHTML(chapterPage("1.1 – Test – SEEK", body));
  const container = document.querySelector(CONTENT_SELECTOR);
  if (!container) {
    throw new Error("fixture has no content container");
  }
  return Array.from(container.querySelectorAll(BLOCK_SELECTOR));
}

/** Body text of exactly `count` words */
export function words(count: number): string {
  return Array.from({ length: count }, (_, i) => `word${i}`).join(" ");
}

/**
 * A chapter page body between a header and a footer navigation paragraph.
 * Without `previous` the page is laid out like the first chapter.
 */
export function storyBody(story: string, links: { previous?: string; next?: string }): string {
  if (links.previous === undefined) {
    return `${navParagraph({ next: links.next ?? "" })}${story}${navParagraph({ next: links.next ?? "" })}`;
  }
  return `${navParagraph(links)}${story}${navParagraph(links)}`;
}

/** Parse a chapter of `wordCount` words without touching the network */
export function makeChapter(url: string, title: string, wordCount: number): Chapter {
  const body = storyBody(`<p>${words(wordCount)}</p>`, { previous: "/prev/", next: "/next/" });
  return Chapter.parse(url, chapterPage(title, body), silentLogger());
}

/** Logger whose calls can be inspected */
export function silentLogger(): { [K in keyof Logger]: Mock } {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/**
 * In-process stand-in for fetch. Unknown URLs answer 404; an Error value
 * makes the request reject like a network failure.
 */
export function fakeFetch(routes: Record<string, string | Error>) {
  return vi.fn(async (url: string): Promise<Response> => {
    const body = routes[url];
    if (body === undefined) {
      return new Response("Not found", { status: 404 });
    }
    if (body instanceof Error) {
      throw body;
    }
    return new Response(body, { status: 200 });
  });
}
