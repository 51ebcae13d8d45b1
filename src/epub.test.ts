import { beforeEach, describe, expect, it, vi } from "vitest";
import { Book } from "./book.js";
import { Chapter } from "./chapter.js";
import {
  arcFileName,
  assembleBook,
  chapterFileName,
  DEFAULT_METADATA,
  IMAGE_STYLE,
  loadStylesheet,
  renderPage,
  rewriteImages,
} from "./epub.js";
import { ImageResolver } from "./images.js";
import { chapterPage, fakeFetch, makeChapter, silentLogger, storyBody } from "./test-helpers.js";
import { serializeChildren } from "./xhtml.js";

const { metadata } = vi.hoisted(() => ({ metadata: vi.fn() }));

vi.mock("sharp", () => ({
  default: vi.fn(() => ({ metadata })),
}));

function storyChapter(url: string, title: string, story: string): Chapter {
  return Chapter.parse(url, chapterPage(title, storyBody(story, { previous: "/p/", next: "/n/" })), silentLogger());
}

function threeChapterBook(): Book {
  const book = new Book();
  book.add(makeChapter("https://example.com/1/", "1.1 – Hack – SEEK", 3));
  book.add(makeChapter("https://example.com/2/", "1.2 – Hack – SEEK", 3));
  book.add(makeChapter("https://example.com/3/", "2.1 – Fall – SEEK", 3));
  return book;
}

const options = () => ({
  fetch: fakeFetch({}),
  stylesheet: "body { margin: 0; }",
  metadata: { date: "2024-10-18" },
  logger: silentLogger(),
});

beforeEach(() => {
  metadata.mockReset();
  metadata.mockResolvedValue({ format: "png" });
});

describe("renderPage", () => {
  it("wraps the body in an XHTML document linked to the stylesheet", () => {
    expect(renderPage("A & B", "<p>x</p>", "en")).toBe(
      [
        '<?xml version="1.0" encoding="utf-8"?>',
        "<!DOCTYPE html>",
        '<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops" lang="en" xml:lang="en">',
        "<head>",
        "  <title>A &amp; B</title>",
        '  <link rel="stylesheet" type="text/css" href="style.css"/>',
        "</head>",
        "<body>",
        "<p>x</p>",
        "</body>",
        "</html>",
        "",
      ].join("\n"),
    );
  });
});

describe("file names", () => {
  it("numbers chapter pages and slugs their names", () => {
    const chapter = makeChapter("https://example.com/1/", "0.1.0 – Hack – SEEK", 1);
    expect(chapterFileName(1, chapter)).toBe("ch-001-0-1-o.xhtml");
  });

  it("numbers arc pages and slugs their labels", () => {
    expect(arcFileName(12, "Hack & Slash")).toBe("arc-12-hack-slash.xhtml");
  });
});

describe("rewriteImages", () => {
  it("points images at their book files and drops unresolved ones", async () => {
    const chapter = storyChapter(
      "https://example.com/1/",
      "1.1 – Hack – SEEK",
      '<p><img src="https://h/map.png?w=600" class="wp-image-7" width="600"></p><p>Text<img src="https://h/gone.png"></p>',
    );
    const resolver = new ImageResolver(fakeFetch({ "https://h/map.png": "png" }), silentLogger());

    await rewriteImages(chapter.content, resolver);

    expect(serializeChildren(chapter.content)).toBe(
      `<p><img src="images/map.png" alt="" style="${IMAGE_STYLE}"/></p><p>Text</p>`,
    );
  });
});

describe("assembleBook", () => {
  it("orders the spine as title page, then each arc page followed by its chapters", async () => {
    const document = await assembleBook(threeChapterBook(), options());

    expect(document.spine).toEqual(["title", "arc-1", "chapter-1", "chapter-2", "arc-2", "chapter-3"]);
    expect(document.items.map((item) => item.href)).toEqual([
      "title.xhtml",
      "arc-01-hack.xhtml",
      "ch-001-1-1.xhtml",
      "ch-002-1-2.xhtml",
      "arc-02-fall.xhtml",
      "ch-003-2-1.xhtml",
      "style.css",
    ]);
  });

  it("nests chapters under their arc in the table of contents", async () => {
    const document = await assembleBook(threeChapterBook(), options());

    expect(document.toc).toEqual([
      {
        title: "Hack",
        href: "arc-01-hack.xhtml",
        children: [
          { title: "1.1", href: "ch-001-1-1.xhtml", children: [] },
          { title: "1.2", href: "ch-002-1-2.xhtml", children: [] },
        ],
      },
      { title: "Fall", href: "arc-02-fall.xhtml", children: [{ title: "2.1", href: "ch-003-2-1.xhtml", children: [] }] },
    ]);
  });

  it("renders title, arc and chapter pages", async () => {
    const document = await assembleBook(threeChapterBook(), options());
    const content = (id: string) => document.items.find((item) => item.id === id)?.content;

    expect(content("title")).toBe(
      renderPage("SEEK", '<h1 style="text-align:center !important; margin-top:40vh;">SEEK</h1>', "en"),
    );
    expect(content("arc-2")).toBe(renderPage("Fall", "<h1>Arc 2: Fall</h1>", "en"));
    expect(content("chapter-1")).toBe(
      renderPage("1.1", '<h1>1.1</h1>\n<div class="chapter-content"><p>word0 word1 word2</p></div>', "en"),
    );
  });

  it("adds the stylesheet after the pages", async () => {
    const document = await assembleBook(threeChapterBook(), options());

    expect(document.items.find((item) => item.id === "style")).toEqual({
      id: "style",
      href: "style.css",
      mediaType: "text/css",
      content: "body { margin: 0; }",
    });
  });

  it("merges metadata overrides over the defaults", async () => {
    const document = await assembleBook(new Book(), { ...options(), metadata: { title: "Test Book", date: "2025-01-02" } });

    expect(document.metadata).toEqual({ ...DEFAULT_METADATA, title: "Test Book", date: "2025-01-02" });
    expect(document.spine).toEqual(["title"]);
  });

  it("dates the book today by default", async () => {
    const document = await assembleBook(new Book(), { ...options(), metadata: undefined });

    expect(document.metadata.date).toBe(new Date().toISOString().slice(0, 10));
  });

  it("stores an image shared by several chapters once", async () => {
    const book = new Book();
    book.add(storyChapter("https://example.com/1/", "1.1 – Hack – SEEK", '<p><img src="https://h/map.png?w=600"></p>'));
    book.add(storyChapter("https://example.com/2/", "1.2 – Hack – SEEK", '<p><img src="https://h/map.png?w=300"></p>'));
    const fetchFn = fakeFetch({ "https://h/map.png": "png" });

    const document = await assembleBook(book, { ...options(), fetch: fetchFn });
    const images = document.items.filter((item) => item.id.startsWith("image-"));

    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(images.map(({ id, href, mediaType }) => ({ id, href, mediaType }))).toEqual([
      { id: "image-1", href: "images/map.png", mediaType: "image/png" },
    ]);
    expect(document.items.at(-1)?.id).toBe("image-1");
  });

  it("points pages at images whose names held escaped delimiters", async () => {
    const book = new Book();
    book.add(storyChapter("https://example.com/1/", "1.1 – Hack – SEEK", '<p><img src="https://h/map%3Fv2.png"></p>'));

    const document = await assembleBook(book, { ...options(), fetch: fakeFetch({ "https://h/map%3Fv2.png": "png" }) });
    const image = document.items.find((item) => item.id === "image-1");
    const page = document.items.find((item) => item.id === "chapter-1")?.content;

    expect(image?.href).toBe("images/map_v2.png");
    expect(page).toContain(`<img src="images/map_v2.png" alt="" style="${IMAGE_STYLE}"/>`);
    expect(new URL(image?.href ?? "", "https://book.invalid/EPUB/ch-001-1-1.xhtml").pathname).toBe(
      "/EPUB/images/map_v2.png",
    );
  });

  it("leaves the scraped chapters untouched", async () => {
    const chapter = storyChapter("https://example.com/1/", "1.1 – Hack – SEEK", '<p><img src="https://h/map.png?w=600"></p>');
    const book = new Book();
    book.add(chapter);

    await assembleBook(book, { ...options(), fetch: fakeFetch({ "https://h/map.png": "png" }) });

    expect(serializeChildren(chapter.content)).toBe('<p><img src="https://h/map.png?w=600"/></p>');
  });
});

describe("loadStylesheet", () => {
  it("reads the stylesheet shipped beside the module", async () => {
    await expect(loadStylesheet()).resolves.toContain(".chapter-content {");
  });
});
