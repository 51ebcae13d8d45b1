/**
 * Assemble the scraped book into EPUB pages, table of contents and resources
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import type { Book } from "./book.js";
import type { Chapter } from "./chapter.js";
import { createFetcher } from "./http.js";
import { ImageResolver } from "./images.js";
import { createLogger, type Logger } from "./logger.js";
import type { BookDocument, BookItem, BookMetadata, FetchFn, TocEntry } from "./types.js";
import { sanitizeFilename } from "./utils.js";
import { escapeAttribute, escapeXml, isElement, serializeXhtml } from "./xhtml.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

const STYLES_FILE = path.join(__dirname, "styles.css");

/** Output path used when none is given on the command line */
export const DEFAULT_OUTPUT_PATH = "SEEK.epub";

export const STYLESHEET_HREF = "style.css";

/** Inline centering for readers that ignore the stylesheet */
export const IMAGE_STYLE = "display:block;margin-left:auto;margin-right:auto;max-width:100%;height:auto;";

export const DEFAULT_METADATA: Omit<BookMetadata, "date"> = {
  identifier: "seek-webserial",
  title: "SEEK",
  language: "en",
  creator: "John C. McCrae (Wildbow)",
  description: "SEEK webserial by John C. McCrae (Wildbow)",
};

const XHTML_MEDIA_TYPE = "application/xhtml+xml";

const defaultLogger = createLogger("epub");

export interface AssembleOptions {
  /** Fetch function for image downloads */
  fetch?: FetchFn;
  /** Overrides for the default book metadata */
  metadata?: Partial<BookMetadata>;
  /** Stylesheet text; read from styles.css when omitted */
  stylesheet?: string;
  logger?: Logger;
}

/**
 * Read the shared book stylesheet that ships beside this module.
 */
export async function loadStylesheet(): Promise<string> {
  return await fs.readFile(STYLES_FILE, "utf-8");
}

/**
 * Wrap body markup in an XHTML content document linked to the shared stylesheet.
 */
export function renderPage(title: string, body: string, language = DEFAULT_METADATA.language): string {
  return [
    '<?xml version="1.0" encoding="utf-8"?>',
    "<!DOCTYPE html>",
    `<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops" lang="${escapeAttribute(language)}" xml:lang="${escapeAttribute(language)}">`,
    "<head>",
    `  <title>${escapeXml(title)}</title>`,
    `  <link rel="stylesheet" type="text/css" href="${STYLESHEET_HREF}"/>`,
    "</head>",
    "<body>",
    body,
    "</body>",
    "</html>",
    "",
  ].join("\n");
}

/**
 * Point every image of a chapter's content at its file inside the book.
 * Images that cannot be resolved are removed.
 *
 * @param content - Element to rewrite in place (a clone of the chapter content)
 */
export async function rewriteImages(content: Element, resolver: ImageResolver): Promise<void> {
  for (const img of Array.from(content.querySelectorAll("img"))) {
    const src = img.getAttribute("src");
    const entry = src ? await resolver.resolve(src) : null;
    if (!entry) {
      img.parentNode?.removeChild(img);
      continue;
    }

    for (const attr of Array.from(img.attributes)) {
      img.removeAttribute(attr.name);
    }
    img.setAttribute("src", entry.fileName);
    img.setAttribute("alt", "");
    img.setAttribute("style", IMAGE_STYLE);
  }
}

/** Chapter page file name, e.g. `ch-001-0-1-o.xhtml` */
export function chapterFileName(position: number, chapter: Chapter): string {
  return `ch-${String(position).padStart(3, "0")}-${sanitizeFilename(chapter.name)}.xhtml`;
}

/** Arc divider file name, e.g. `arc-01-hack.xhtml` */
export function arcFileName(position: number, label: string): string {
  return `arc-${String(position).padStart(2, "0")}-${sanitizeFilename(label)}.xhtml`;
}

/**
 * Build every page of the book in reading order.
 *
 * Spine: title page, then for each arc its divider page followed by its
 * chapters. The table of contents mirrors that order, one entry per arc with
 * its chapters nested. Images are downloaded once for the whole book.
 */
export async function assembleBook(book: Book, options: AssembleOptions = {}): Promise<BookDocument> {
  const { fetch: fetchFn = createFetcher(), logger = defaultLogger } = options;
  const metadata: BookMetadata = {
    ...DEFAULT_METADATA,
    date: new Date().toISOString().slice(0, 10),
    ...options.metadata,
  };
  const stylesheet = options.stylesheet ?? (await loadStylesheet());
  const resolver = new ImageResolver(fetchFn, logger);

  const items: BookItem[] = [];
  const spine: string[] = [];
  const toc: TocEntry[] = [];

  const addPage = (id: string, href: string, content: string) => {
    items.push({ id, href, mediaType: XHTML_MEDIA_TYPE, content });
    spine.push(id);
  };

  addPage(
    "title",
    "title.xhtml",
    renderPage(
      metadata.title,
      `<h1 style="text-align:center !important; margin-top:40vh;">${escapeXml(metadata.title)}</h1>`,
      metadata.language,
    ),
  );

  let arcPosition = 0;
  let chapterPosition = 0;
  for (const arc of book.values()) {
    arcPosition++;
    const arcHref = arcFileName(arcPosition, arc.label);
    addPage(
      `arc-${arcPosition}`,
      arcHref,
      renderPage(arc.label, `<h1>Arc ${arcPosition}: ${escapeXml(arc.label)}</h1>`, metadata.language),
    );
    const arcEntry: TocEntry = { title: arc.label, href: arcHref, children: [] };

    for (const chapter of arc.values()) {
      chapterPosition++;
      const content = chapter.content.cloneNode(true);
      if (!isElement(content)) continue;
      await rewriteImages(content, resolver);

      const href = chapterFileName(chapterPosition, chapter);
      addPage(
        `chapter-${chapterPosition}`,
        href,
        renderPage(chapter.name, `<h1>${escapeXml(chapter.name)}</h1>\n${serializeXhtml(content)}`, metadata.language),
      );
      arcEntry.children.push({ title: chapter.name, href, children: [] });
      logger.debug(`Added chapter ${chapter.name} as ${href}`);
    }

    toc.push(arcEntry);
  }

  items.push({ id: "style", href: STYLESHEET_HREF, mediaType: "text/css", content: stylesheet });

  resolver.images.forEach((image, index) => {
    items.push({ id: `image-${index + 1}`, href: image.fileName, mediaType: image.mediaType, content: image.data });
  });

  logger.info(`Assembled ${spine.length} pages and ${resolver.size} images`);
  return { metadata, items, spine, toc };
}
