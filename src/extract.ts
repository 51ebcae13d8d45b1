/**
 * Story content extraction for WordPress chapter pages.
 *
 * Chapter pages wrap the story in navigation paragraphs holding bold
 * "Previous Chapter" / "Next Chapter" links. The first chapter has no previous
 * link, so its page repeats "Next Chapter" above and below the story instead.
 */

import { createLogger, type Logger } from "./logger.js";
import type { ExtractionResult } from "./types.js";
import { normalizeImageUrl } from "./utils.js";
import { isElement, isText } from "./xhtml.js";

export const PREVIOUS_CHAPTER = "Previous Chapter";
export const NEXT_CHAPTER = "Next Chapter";

const NAV_TEXTS: readonly string[] = [PREVIOUS_CHAPTER, NEXT_CHAPTER];

/** Block elements considered when looking for story content */
export const BLOCK_SELECTOR = "p, div, figure";

/** How many leading elements are checked for a "Previous Chapter" marker */
const FIRST_CHAPTER_WINDOW = 3;

const defaultLogger = createLogger("extract");

/**
 * Check whether an element holds a `<strong>` whose text is exactly `marker`.
 */
export function hasMarker(element: Element, marker: string): boolean {
  return Array.from(element.querySelectorAll("strong")).some((strong) => strong.textContent === marker);
}

/**
 * Index of the first element at or after `from` that holds `marker`, or -1.
 */
export function findMarker(elements: readonly Element[], marker: string, from = 0): number {
  for (let i = from; i < elements.length; i++) {
    if (hasMarker(elements[i], marker)) return i;
  }
  return -1;
}

/**
 * A page is the first chapter when none of its first three elements links back.
 * This is a layout heuristic for the source site, not a guarantee.
 */
export function isFirstChapter(elements: readonly Element[]): boolean {
  return !elements.slice(0, FIRST_CHAPTER_WINDOW).some((element) => hasMarker(element, PREVIOUS_CHAPTER));
}

function unwrap(element: Element): void {
  const parent = element.parentNode;
  if (!parent) return;
  while (element.firstChild) {
    parent.insertBefore(element.firstChild, element);
  }
  parent.removeChild(element);
}

function removeNavigationText(node: Node): void {
  for (const child of Array.from(node.childNodes)) {
    if (isText(child)) {
      if (NAV_TEXTS.includes((child.textContent ?? "").trim())) {
        node.removeChild(child);
      }
    } else {
      removeNavigationText(child);
    }
  }
}

/**
 * Strip navigation remnants from an element, in place.
 *
 * - anchors wrapping a navigation label, or wrapping only an image, are unwrapped
 * - `<strong>` navigation labels and bare navigation text nodes are removed
 */
export function sanitizeNavigation(element: Element): Element {
  for (const anchor of Array.from(element.querySelectorAll("a"))) {
    const isNavLink = Array.from(anchor.querySelectorAll("strong")).some((strong) =>
      NAV_TEXTS.includes(strong.textContent ?? ""),
    );
    const isImageLink = anchor.querySelector("img") !== null && (anchor.textContent ?? "").trim() === "";
    if (isNavLink || isImageLink) {
      unwrap(anchor);
    }
  }

  for (const strong of Array.from(element.querySelectorAll("strong"))) {
    if (NAV_TEXTS.includes((strong.textContent ?? "").trim())) {
      strong.parentNode?.removeChild(strong);
    }
  }

  removeNavigationText(element);
  return element;
}

/**
 * Split a page's block elements into story content and navigation.
 *
 * Inputs are never modified: retained elements are sanitized clones.
 *
 * @param elements - Block elements of the page's content container, in document order
 */
export function extractContent(elements: readonly Element[], logger: Logger = defaultLogger): ExtractionResult {
  const firstChapter = isFirstChapter(elements);
  logger.debug(`Is first chapter: ${firstChapter}`);

  const startMarker = findMarker(elements, NEXT_CHAPTER);
  const endLabel = firstChapter ? NEXT_CHAPTER : PREVIOUS_CHAPTER;
  const endMarker = startMarker === -1 ? -1 : findMarker(elements, endLabel, startMarker + 1);
  const degraded = startMarker === -1 || endMarker === -1;

  const retainedOriginals: Element[] = [];
  const retained: Element[] = [];
  let rescued = 0;

  const retain = (element: Element) => {
    if (retainedOriginals.some((ancestor) => ancestor.contains(element))) return false;
    retainedOriginals.push(element);

    const clone = element.cloneNode(true);
    if (!isElement(clone)) return false;
    sanitizeNavigation(clone);

    const style = clone.getAttribute("style");
    if (style !== null) {
      clone.setAttribute("style", `${style} !important`);
    }
    retained.push(clone);
    return true;
  };

  let range: ExtractionResult["range"];
  if (degraded) {
    logger.warn("Could not find content markers, copying all content");
    range = { start: 0, end: elements.length - 1 };
    for (const element of elements) {
      retain(element);
    }
  } else {
    range = { start: startMarker + 1, end: endMarker - 1 };
    logger.debug(`Content range is ${range.start}..${range.end} of ${elements.length} elements`);

    // Images placed above the navigation header belong to the chapter too
    for (const element of elements.slice(0, startMarker)) {
      if (element.querySelector("img") && retain(element)) {
        rescued++;
      }
    }
    for (const element of elements.slice(range.start, range.end + 1)) {
      retain(element);
    }
  }

  const imageUrls: string[] = [];
  for (const element of retained) {
    for (const img of Array.from(element.querySelectorAll("img"))) {
      const src = img.getAttribute("src");
      if (!src) continue;
      const url = normalizeImageUrl(src);
      if (url && !imageUrls.includes(url)) {
        imageUrls.push(url);
      }
    }
  }

  const text = retained
    .flatMap((element) =>
      element.tagName.toLowerCase() === "p" ? [element] : Array.from(element.querySelectorAll("p")),
    )
    .map((element) => element.textContent ?? "")
    .join("\n\n")
    .trim();

  return { range, elements: retained, rescued, text, imageUrls, degraded };
}
