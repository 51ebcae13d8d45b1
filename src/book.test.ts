import { describe, expect, it } from "vitest";
import { Arc, Book } from "./book.js";
import { makeChapter } from "./test-helpers.js";

describe("Book", () => {
  it("groups chapters into arcs in the order arcs are first seen", () => {
    const book = new Book();
    book.add(makeChapter("https://example.com/1/", "1.1 – Zeta – SEEK", 10));
    book.add(makeChapter("https://example.com/2/", "2.1 – Alpha – SEEK", 20));
    book.add(makeChapter("https://example.com/3/", "1.2 – Zeta – SEEK", 30));

    expect([...book.keys()]).toEqual(["Zeta", "Alpha"]);
    expect([...(book.get("Zeta")?.keys() ?? [])]).toEqual(["1.1", "1.2"]);
    expect([...book.chapters()].map((chapter) => chapter.url)).toEqual([
      "https://example.com/1/",
      "https://example.com/3/",
      "https://example.com/2/",
    ]);
  });

  it("returns the arc a chapter was added to", () => {
    const book = new Book();
    const arc = book.add(makeChapter("https://example.com/1/", "1.1 – Zeta – SEEK", 10));

    expect(arc).toBeInstanceOf(Arc);
    expect(arc.label).toBe("Zeta");
    expect(book.add(makeChapter("https://example.com/2/", "1.2 – Zeta – SEEK", 10))).toBe(arc);
  });

  it("sums word counts per arc and for the book", () => {
    const book = new Book();
    book.add(makeChapter("https://example.com/1/", "1.1 – Zeta – SEEK", 10));
    book.add(makeChapter("https://example.com/2/", "1.2 – Zeta – SEEK", 15));
    book.add(makeChapter("https://example.com/3/", "2.1 – Alpha – SEEK", 7));

    expect(book.get("Zeta")?.wordCount).toBe(25);
    expect(book.get("Alpha")?.wordCount).toBe(7);
    expect(book.wordCount).toBe(32);
    expect(book.chapterCount).toBe(3);
  });

  it("is empty before any chapter is added", () => {
    const book = new Book();

    expect(book.size).toBe(0);
    expect(book.wordCount).toBe(0);
    expect(book.chapterCount).toBe(0);
    expect([...book.chapters()]).toEqual([]);
  });
});
