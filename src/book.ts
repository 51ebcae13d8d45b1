/**
 * Arcs and the book, both ordered by discovery
 */

import type { Chapter } from "./chapter.js";
import { OrderedMap } from "./ordered-map.js";

/** Chapters of one arc, keyed by display name, in the order they were scraped */
export class Arc extends OrderedMap<string, Chapter> {
  constructor(readonly label: string) {
    super();
  }

  get wordCount(): number {
    let total = 0;
    for (const chapter of this.values()) total += chapter.wordCount;
    return total;
  }
}

/** Arcs keyed by label, in the order they were first seen */
export class Book extends OrderedMap<string, Arc> {
  /**
   * Register a chapter under its arc, creating the arc on first sight.
   *
   * @returns The arc the chapter was added to
   */
  add(chapter: Chapter): Arc {
    let arc = this.get(chapter.arc);
    if (!arc) {
      arc = new Arc(chapter.arc);
      this.set(chapter.arc, arc);
    }
    arc.set(chapter.name, chapter);
    return arc;
  }

  get wordCount(): number {
    let total = 0;
    for (const arc of this.values()) total += arc.wordCount;
    return total;
  }

  get chapterCount(): number {
    let total = 0;
    for (const arc of this.values()) total += arc.size;
    return total;
  }

  /** Every chapter in reading order */
  *chapters(): IterableIterator<Chapter> {
    for (const arc of this.values()) {
      yield* arc.values();
    }
  }
}
