#!/usr/bin/env node
/**
 * Run full pipeline: scrape → word-count report → EPUB
 *
 * Usage: npm start -- [start-url] [options]
 */

import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { writeEpub } from "./archive.js";
import { assembleBook, DEFAULT_OUTPUT_PATH } from "./epub.js";
import { getErrorMessage } from "./errors.js";
import { createFetcher } from "./http.js";
import { createLogger, levelForVerbosity, setLogLevel } from "./logger.js";
import { FIRST_CHAPTER_URL, scrapeBook } from "./scrape.js";
import { computeStats, formatReport } from "./stats.js";
import {
  countVerbosity,
  getNullableStringArg,
  getNumberArg,
  getPositionalArg,
  hasFlag,
  hasHelpFlag,
  setupSignalHandlers,
  validateUrl,
} from "./utils.js";

const logger = createLogger("main");

/**
 * Format duration in milliseconds to human-readable string
 * Exported for testing
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;

  if (minutes > 0) {
    return `${minutes}m ${remainingSeconds}s`;
  }
  return `${seconds}s`;
}

export interface StepTiming {
  step: string;
  duration: number;
}

export interface CliOptions {
  startUrl: string;
  /** Number of -v flags */
  verbosity: number;
  /** Whether to build the EPUB */
  epub: boolean;
  /** EPUB output path, or null for the default */
  output: string | null;
  /** Delay between chapter requests (ms) */
  chapterDelay: number;
  showHelp: boolean;
}

/** Flags that take values, used for positional argument detection */
const VALUE_FLAGS = ["-o", "--output", "--delay"];

/**
 * Parse command line arguments from an array
 * Exported for testing
 */
export function parseArgs(args: string[] = process.argv.slice(2)): CliOptions {
  return {
    startUrl: getPositionalArg(args, VALUE_FLAGS) || FIRST_CHAPTER_URL,
    verbosity: countVerbosity(args),
    epub: hasFlag(args, "-e", "--epub"),
    output: getNullableStringArg(args, "-o", "--output"),
    chapterDelay: getNumberArg(args, "--delay", 0),
    showHelp: hasHelpFlag(args),
  };
}

function showUsage(): void {
  console.log("Usage: npm start -- [start-url] [options]");
  console.log("");
  console.log("Walk the webserial's chapters, print word counts and optionally build an EPUB.");
  console.log("");
  console.log("Options:");
  console.log("  -v, --verbose        More log output (repeat for debug: -vv)");
  console.log("  -e, --epub           Create EPUB version of the book");
  console.log(`  -o, --output <path>  Output path for EPUB file (default: ${DEFAULT_OUTPUT_PATH})`);
  console.log("  --delay <ms>         Delay between chapters (default: 0)");
  console.log("  --help, -h           Show this help message");
  console.log("");
  console.log(`Start URL defaults to ${FIRST_CHAPTER_URL}`);
}

/**
 * Run one pipeline step and record how long it took
 * Exported for testing
 */
export async function timeStep<T>(step: string, timings: StepTiming[], action: () => Promise<T>): Promise<T> {
  const start = Date.now();
  const result = await action();
  timings.push({ step, duration: Date.now() - start });
  return result;
}

export async function main(args: string[] = process.argv.slice(2)): Promise<void> {
  const options = parseArgs(args);

  if (options.showHelp) {
    showUsage();
    process.exit(0);
  }

  const urlValidation = validateUrl(options.startUrl);
  if (!urlValidation.isValid) {
    console.error(`Error: ${urlValidation.error}`);
    process.exit(1);
  }

  setLogLevel(levelForVerbosity(options.verbosity));

  const fetchFn = createFetcher();
  const timings: StepTiming[] = [];

  const book = await timeStep("Scraping chapters", timings, () =>
    scrapeBook({
      startUrl: options.startUrl,
      fetch: fetchFn,
      chapterDelay: options.chapterDelay,
      onChapter: (chapter, index) => logger.info(`[${index + 1}] ${chapter.arc} ${chapter.name}`),
    }),
  );

  console.log(formatReport(computeStats(book)));

  if (options.epub) {
    const outputPath = options.output ?? DEFAULT_OUTPUT_PATH;
    const document = await timeStep("Assembling EPUB", timings, () => assembleBook(book, { fetch: fetchFn }));
    const size = await timeStep("Writing EPUB", timings, () => writeEpub(document, outputPath));
    const sizeMb = (size / 1024 / 1024).toFixed(2);
    logger.info(`EPUB created successfully: ${outputPath} (${sizeMb} MB)`);
  }

  logger.info("Timing summary:");
  for (const { step, duration } of timings) {
    logger.info(`  ${step.padEnd(20)} ${formatDuration(duration)}`);
  }
}

// Only run main when executed directly (not when imported for testing)
if (process.argv[1] && import.meta.url === pathToFileURL(realpathSync(process.argv[1])).href) {
  setupSignalHandlers("Scraping");
  main().catch((error) => {
    console.error("Error:", getErrorMessage(error));
    process.exit(1);
  });
}
