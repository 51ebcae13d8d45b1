/**
 * Utility functions for the scraper
 * Extracted for testability
 */

/** Flag to prevent multiple signal handlers from running */
let isExiting = false;

/**
 * Setup graceful shutdown handlers for SIGINT (Ctrl+C) and SIGTERM.
 * Displays a clean message instead of a stack trace when interrupted.
 * Should be called once at the start of the main entry point.
 *
 * @param commandName - Name of the command for the exit message (e.g., "Scraping")
 */
export function setupSignalHandlers(commandName: string): void {
  const handler = (signal: NodeJS.Signals) => {
    if (isExiting) return;
    isExiting = true;

    console.error(`\n${commandName} interrupted.`);

    // 128 + signal number (SIGINT = 2, SIGTERM = 15)
    process.exit(signal === "SIGINT" ? 130 : 143);
  };

  process.on("SIGINT", handler);
  process.on("SIGTERM", handler);
}

/**
 * Wait for specified milliseconds.
 *
 * @param ms - Duration to wait in milliseconds
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Create a safe filename from a title.
 * Converts to lowercase, replaces special characters with dashes,
 * and truncates to 50 characters.
 *
 * @example
 * sanitizeFilename('Arc 1: Hack') // 'arc-1-hack'
 * sanitizeFilename('0.1.O') // '0-1-o'
 */
export function sanitizeFilename(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-|-$/g, "")
    .slice(0, 50);
}

/**
 * Resolve a possibly relative href against the page it was found on.
 *
 * @returns Absolute URL, or null if either part is not a valid URL
 *
 * @example
 * resolveUrl('/2024/10/20/0-2/', 'https://example.com/2024/10/18/0-1/')
 * // 'https://example.com/2024/10/20/0-2/'
 */
export function resolveUrl(href: string, baseUrl: string): string | null {
  try {
    return new URL(href, baseUrl).href;
  } catch {
    return null;
  }
}

/**
 * Strip the query string from an image URL.
 * The source site serves the same image at several scales via `?w=` parameters.
 *
 * @example
 * normalizeImageUrl('https://h/img.jpg?w=600') // 'https://h/img.jpg'
 */
export function normalizeImageUrl(src: string): string {
  return src.split("?")[0];
}

/**
 * Count whitespace-delimited tokens.
 */
export function countWords(text: string): number {
  return text.split(/\s+/).filter((token) => token.length > 0).length;
}

// ============================================================================
// Argument Parsing Helpers
// ============================================================================

/**
 * Check if help flag is present in arguments.
 *
 * @param args - Command line arguments array
 * @returns True if --help or -h is present
 */
export function hasHelpFlag(args: string[]): boolean {
  return args.includes("--help") || args.includes("-h");
}

/**
 * Check if any of the given flags is present.
 *
 * @example
 * hasFlag(['-e'], '-e', '--epub') // true
 */
export function hasFlag(args: string[], ...flags: string[]): boolean {
  return args.some((arg) => flags.includes(arg));
}

/**
 * Count verbosity flags. Accepts repeated `-v`, stacked `-vv` and `--verbose`.
 *
 * @example
 * countVerbosity(['-v', '-v']) // 2
 * countVerbosity(['-vvv']) // 3
 */
export function countVerbosity(args: string[]): number {
  let count = 0;
  for (const arg of args) {
    if (arg === "--verbose") {
      count++;
    } else if (/^-v+$/.test(arg)) {
      count += arg.length - 1;
    }
  }
  return count;
}

/**
 * Get a nullable string argument value from command line arguments.
 * The first of the given flags that carries a value wins.
 *
 * @param args - Command line arguments array
 * @param flags - Flag spellings to look for (e.g., '-o', '--output')
 * @returns The argument value or null if not found
 */
export function getNullableStringArg(args: string[], ...flags: string[]): string | null {
  for (let i = 0; i < args.length; i++) {
    if (flags.includes(args[i]) && args[i + 1] && !args[i + 1].startsWith("-")) {
      return args[i + 1];
    }
  }
  return null;
}

/**
 * Get a number argument value from command line arguments.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--delay')
 * @param defaultValue - Default value if flag not found
 * @returns The parsed number or default
 */
export function getNumberArg(args: string[], flag: string, defaultValue: number): number {
  for (let i = 0; i < args.length; i++) {
    if (args[i] === flag && args[i + 1]) {
      const parsed = parseInt(args[i + 1], 10);
      if (!isNaN(parsed)) {
        return parsed;
      }
    }
  }
  return defaultValue;
}

/**
 * Get the first positional (non-flag) argument.
 * Skips values that follow flags (e.g., in '--delay 1000', skips '1000').
 *
 * @param args - Command line arguments array
 * @param knownFlags - Flags that take values (to skip their values)
 * @returns The first non-flag argument or empty string
 */
export function getPositionalArg(args: string[], knownFlags: string[] = []): string {
  let skipNext = false;
  for (const arg of args) {
    if (skipNext) {
      skipNext = false;
      continue;
    }
    if (knownFlags.includes(arg)) {
      skipNext = true;
      continue;
    }
    if (!arg.startsWith("-")) {
      return arg;
    }
  }
  return "";
}

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Validate that a string is a valid HTTP/HTTPS URL.
 *
 * @example
 * validateUrl('https://example.com') // { isValid: true }
 * validateUrl('not-a-url') // { isValid: false, error: 'Invalid URL format' }
 * validateUrl('ftp://example.com') // { isValid: false, error: 'URL must use http or https protocol' }
 */
export function validateUrl(url: string): { isValid: true } | { isValid: false; error: string } {
  if (!url) {
    return { isValid: false, error: "URL is required" };
  }

  try {
    const parsed = new URL(url);
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      return { isValid: false, error: "URL must use http or https protocol" };
    }
    return { isValid: true };
  } catch {
    return { isValid: false, error: "Invalid URL format" };
  }
}
