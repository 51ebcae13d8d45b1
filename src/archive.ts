/**
 * Package an assembled book as an EPUB 3 file
 *
 * Layout:
 *   mimetype                  (stored uncompressed, first entry)
 *   META-INF/container.xml
 *   EPUB/content.opf
 *   EPUB/nav.xhtml            (EPUB 3 navigation document)
 *   EPUB/toc.ncx              (for EPUB 2 readers)
 *   EPUB/<items>
 */

import * as fs from "node:fs/promises";
import JSZip from "jszip";
import type { BookDocument, TocEntry } from "./types.js";
import { escapeAttribute, escapeXml } from "./xhtml.js";

export const EPUB_MIME_TYPE = "application/epub+zip";

/** Folder holding the package document and all content */
export const CONTENT_DIR = "EPUB";

export const CONTAINER_XML = `<?xml version="1.0" encoding="utf-8"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles>
    <rootfile full-path="${CONTENT_DIR}/content.opf" media-type="application/oebps-package+xml"/>
  </rootfiles>
</container>
`;

/**
 * Render the OPF package document: metadata, manifest and spine.
 */
export function renderPackage(document: BookDocument): string {
  const { metadata } = document;
  const manifest = [
    '    <item id="nav" href="nav.xhtml" media-type="application/xhtml+xml" properties="nav"/>',
    '    <item id="ncx" href="toc.ncx" media-type="application/x-dtbncx+xml"/>',
    ...document.items.map(
      (item) =>
        `    <item id="${escapeAttribute(item.id)}" href="${escapeAttribute(item.href)}" media-type="${escapeAttribute(item.mediaType)}"/>`,
    ),
  ];
  const spine = document.spine.map((id) => `    <itemref idref="${escapeAttribute(id)}"/>`);

  return [
    '<?xml version="1.0" encoding="utf-8"?>',
    `<package xmlns="http://www.idpf.org/2007/opf" version="3.0" unique-identifier="book-id" xml:lang="${escapeAttribute(metadata.language)}">`,
    '  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/">',
    `    <dc:identifier id="book-id">${escapeXml(metadata.identifier)}</dc:identifier>`,
    `    <dc:title>${escapeXml(metadata.title)}</dc:title>`,
    `    <dc:language>${escapeXml(metadata.language)}</dc:language>`,
    `    <dc:creator>${escapeXml(metadata.creator)}</dc:creator>`,
    `    <dc:description>${escapeXml(metadata.description)}</dc:description>`,
    `    <dc:date>${escapeXml(metadata.date)}</dc:date>`,
    `    <meta property="dcterms:modified">${escapeXml(metadata.date)}T00:00:00Z</meta>`,
    "  </metadata>",
    "  <manifest>",
    ...manifest,
    "  </manifest>",
    '  <spine toc="ncx">',
    ...spine,
    "  </spine>",
    "</package>",
    "",
  ].join("\n");
}

function renderNavList(entries: TocEntry[], indent: string): string[] {
  const lines = [`${indent}<ol>`];
  for (const entry of entries) {
    const link = `<a href="${escapeAttribute(entry.href)}">${escapeXml(entry.title)}</a>`;
    if (entry.children.length === 0) {
      lines.push(`${indent}  <li>${link}</li>`);
    } else {
      lines.push(`${indent}  <li>${link}`, ...renderNavList(entry.children, `${indent}    `), `${indent}  </li>`);
    }
  }
  lines.push(`${indent}</ol>`);
  return lines;
}

/**
 * Render the EPUB 3 navigation document from the table of contents.
 */
export function renderNav(document: BookDocument): string {
  const { metadata } = document;
  return [
    '<?xml version="1.0" encoding="utf-8"?>',
    "<!DOCTYPE html>",
    `<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops" lang="${escapeAttribute(metadata.language)}" xml:lang="${escapeAttribute(metadata.language)}">`,
    "<head>",
    `  <title>${escapeXml(metadata.title)}</title>`,
    "</head>",
    "<body>",
    '  <nav epub:type="toc" id="toc">',
    `    <h1>${escapeXml(metadata.title)}</h1>`,
    ...renderNavList(document.toc, "    "),
    "  </nav>",
    "</body>",
    "</html>",
    "",
  ].join("\n");
}

/**
 * Render the NCX table of contents. Play order follows the TOC depth-first.
 */
export function renderNcx(document: BookDocument): string {
  const { metadata } = document;
  let playOrder = 0;

  const navPoints = (entries: TocEntry[], indent: string): string[] =>
    entries.flatMap((entry) => {
      playOrder++;
      return [
        `${indent}<navPoint id="navpoint-${playOrder}" playOrder="${playOrder}">`,
        `${indent}  <navLabel><text>${escapeXml(entry.title)}</text></navLabel>`,
        `${indent}  <content src="${escapeAttribute(entry.href)}"/>`,
        ...navPoints(entry.children, `${indent}  `),
        `${indent}</navPoint>`,
      ];
    });

  return [
    '<?xml version="1.0" encoding="utf-8"?>',
    '<ncx xmlns="http://www.daisy.org/z3986/2005/ncx/" version="2005-1">',
    "  <head>",
    `    <meta name="dtb:uid" content="${escapeAttribute(metadata.identifier)}"/>`,
    '    <meta name="dtb:depth" content="2"/>',
    '    <meta name="dtb:totalPageCount" content="0"/>',
    '    <meta name="dtb:maxPageNumber" content="0"/>',
    "  </head>",
    `  <docTitle><text>${escapeXml(metadata.title)}</text></docTitle>`,
    "  <navMap>",
    ...navPoints(document.toc, "    "),
    "  </navMap>",
    "</ncx>",
    "",
  ].join("\n");
}

/**
 * Lay out a book as an EPUB zip archive.
 */
export function buildArchive(document: BookDocument): JSZip {
  const zip = new JSZip();
  zip.file("mimetype", EPUB_MIME_TYPE, { compression: "STORE" });
  zip.file("META-INF/container.xml", CONTAINER_XML);

  const content = zip.folder(CONTENT_DIR);
  if (!content) {
    throw new Error(`Could not create ${CONTENT_DIR}/ folder in archive`);
  }
  content.file("content.opf", renderPackage(document));
  content.file("nav.xhtml", renderNav(document));
  content.file("toc.ncx", renderNcx(document));
  for (const item of document.items) {
    content.file(item.href, item.content);
  }
  return zip;
}

/**
 * Write a book to disk as an EPUB file.
 *
 * @returns Size of the written file in bytes
 */
export async function writeEpub(document: BookDocument, outputPath: string): Promise<number> {
  const buffer = await buildArchive(document).generateAsync({
    type: "nodebuffer",
    mimeType: EPUB_MIME_TYPE,
    compression: "DEFLATE",
  });
  await fs.writeFile(outputPath, buffer);
  return buffer.length;
}
