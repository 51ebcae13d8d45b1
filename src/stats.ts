/**
 * Word-count statistics for a scraped book
 *
 * `computeStats` only aggregates; `formatReport` turns the numbers into the
 * text report printed at the end of a run.
 */

import type { Book } from "./book.js";

export interface ChapterStats {
  name: string;
  words: number;
  /** Share of the arc's words, 0–100 */
  percentOfArc: number;
}

export interface ArcStats {
  label: string;
  words: number;
  /** Share of the book's words, 0–100 */
  percentOfTotal: number;
  chapters: ChapterStats[];
}

export interface BookStats {
  totalWords: number;
  chapterCount: number;
  /** Arcs in reading order */
  arcs: ArcStats[];
  /** Arcs by word count, largest first; ties keep reading order */
  arcsByWords: ArcStats[];
  averageChaptersPerArc: number;
  averageWordsPerChapter: number;
  averageWordsPerArc: number;
}

const RULE_WIDTH = 60;

/**
 * Percentage of `part` in `whole`; 0 when `whole` is 0.
 */
export function percentage(part: number, whole: number): number {
  return whole === 0 ? 0 : (part / whole) * 100;
}

export function computeStats(book: Book): BookStats {
  const totalWords = book.wordCount;
  const chapterCount = book.chapterCount;

  const arcs: ArcStats[] = [...book.values()].map((arc) => {
    const words = arc.wordCount;
    return {
      label: arc.label,
      words,
      percentOfTotal: percentage(words, totalWords),
      chapters: [...arc.values()].map((chapter) => ({
        name: chapter.name,
        words: chapter.wordCount,
        percentOfArc: percentage(chapter.wordCount, words),
      })),
    };
  });

  return {
    totalWords,
    chapterCount,
    arcs,
    arcsByWords: [...arcs].sort((a, b) => b.words - a.words),
    averageChaptersPerArc: arcs.length === 0 ? 0 : chapterCount / arcs.length,
    averageWordsPerChapter: chapterCount === 0 ? 0 : totalWords / chapterCount,
    averageWordsPerArc: arcs.length === 0 ? 0 : totalWords / arcs.length,
  };
}

/**
 * @example
 * formatPercent(33.333) // '33.3%'
 */
export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

/**
 * Whole number with thousands separators.
 *
 * @example
 * formatCount(12345.6) // '12,346'
 */
export function formatCount(value: number): string {
  return Math.round(value).toLocaleString("en-US");
}

function treePipe(index: number, length: number): string {
  return index === length - 1 ? "└─" : "├─";
}

/**
 * Render the word-count report.
 *
 * @param title - Book title for the report header
 */
export function formatReport(stats: BookStats, title = "SEEK"): string {
  const rule = "=".repeat(RULE_WIDTH);
  const thinRule = "-".repeat(RULE_WIDTH);
  const lines: string[] = ["", rule, `${title} Word Count Analysis`, rule];

  lines.push("", `Total Word Count: ${formatCount(stats.totalWords)}`, thinRule);

  for (const arc of stats.arcs) {
    lines.push(
      "",
      `Arc: ${arc.label}`,
      `   ├─ Word Count: ${formatCount(arc.words)} (${formatPercent(arc.percentOfTotal)})`,
      "   └─ Chapters:",
    );
    const nameWidth = Math.max(0, ...arc.chapters.map((chapter) => chapter.name.length));
    arc.chapters.forEach((chapter, i) => {
      const pipe = treePipe(i, arc.chapters.length);
      lines.push(
        `      ${pipe} ${chapter.name.padEnd(nameWidth)} : ${formatCount(chapter.words)} (${formatPercent(chapter.percentOfArc)})`,
      );
    });
  }

  lines.push("", rule, "Summary", thinRule, "", "Arc Statistics (sorted by word count):");
  stats.arcsByWords.forEach((arc, i) => {
    const pipe = treePipe(i, stats.arcsByWords.length);
    lines.push(`   ${pipe} ${arc.label}: ${formatCount(arc.words)} words (${formatPercent(arc.percentOfTotal)})`);
  });

  lines.push(
    "",
    "Average Statistics:",
    `   ├─ Average chapters per arc: ${stats.averageChaptersPerArc.toFixed(1)}`,
    `   ├─ Average words per chapter: ${formatCount(stats.averageWordsPerChapter)}`,
    `   └─ Average words per arc: ${formatCount(stats.averageWordsPerArc)}`,
    "",
    rule,
    "",
  );

  return lines.join("\n");
}
