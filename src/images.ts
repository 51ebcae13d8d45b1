/**
 * Download-once cache for images referenced by chapters
 */

import * as path from "node:path/posix";
import sharp from "sharp";
import { getErrorMessage } from "./errors.js";
import { fetchBytes } from "./http.js";
import { createLogger, type Logger } from "./logger.js";
import type { FetchFn, ImageEntry } from "./types.js";
import { normalizeImageUrl } from "./utils.js";

/** Folder inside the book that holds every image */
export const IMAGES_DIR = "images";

const DEFAULT_MEDIA_TYPE = "image/jpeg";

const MEDIA_TYPES: Record<string, string> = {
  ".avif": "image/avif",
  ".bmp": "image/bmp",
  ".gif": "image/gif",
  ".ico": "image/vnd.microsoft.icon",
  ".jpe": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".jpg": "image/jpeg",
  ".png": "image/png",
  ".svg": "image/svg+xml",
  ".tif": "image/tiff",
  ".tiff": "image/tiff",
  ".webp": "image/webp",
};

/** Formats sharp cannot read; these are stored without the decode check */
const UNCHECKED_EXTENSIONS = new Set([".bmp", ".ico"]);

/** Characters that would change the meaning of a relative href */
const UNSAFE_NAME_CHARS = /[\s?#%/\\:]/g;

const defaultLogger = createLogger("images");

/**
 * Guess an image media type from a filename extension.
 * Unknown extensions fall back to JPEG.
 *
 * @example
 * guessMediaType('images/cover.PNG') // 'image/png'
 * guessMediaType('images/img_0') // 'image/jpeg'
 */
export function guessMediaType(fileName: string): string {
  return MEDIA_TYPES[path.extname(fileName).toLowerCase()] ?? DEFAULT_MEDIA_TYPE;
}

/**
 * Base filename for an image URL: the last path segment, percent-decoded,
 * with whitespace and URL delimiters replaced by underscores.
 *
 * @example
 * imageBaseName('https://h/uploads/my%20map.png?w=600') // 'my_map.png'
 * imageBaseName('https://h/map%3Fv2.png') // 'map_v2.png'
 *
 * @returns The base name, or an empty string when the path ends in "/"
 */
export function imageBaseName(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url;
  }
  return decodeSegment(path.basename(pathname)).replace(UNSAFE_NAME_CHARS, "_");
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Resolves remote image URLs to files inside the book.
 *
 * One instance covers one assembly run: each normalized URL is fetched at most
 * once, and every stored image gets a filename no other URL uses.
 */
export class ImageResolver {
  private readonly entries = new Map<string, ImageEntry>();
  private readonly failed = new Set<string>();
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;

  constructor(fetchFn: FetchFn, logger: Logger = defaultLogger) {
    this.fetchFn = fetchFn;
    this.logger = logger;
  }

  /** Number of images stored so far */
  get size(): number {
    return this.entries.size;
  }

  /** Stored images in the order they were first resolved */
  get images(): ImageEntry[] {
    return [...this.entries.values()];
  }

  /** Cached entry for a URL, without fetching */
  lookup(url: string): ImageEntry | undefined {
    return this.entries.get(normalizeImageUrl(url));
  }

  /**
   * Resolve an image URL, downloading it on first use.
   *
   * @returns The stored image, or null if it could not be downloaded or decoded
   */
  async resolve(src: string): Promise<ImageEntry | null> {
    const url = normalizeImageUrl(src);
    const cached = this.entries.get(url);
    if (cached) return cached;
    if (this.failed.has(url)) return null;

    const baseName = imageBaseName(url);
    let data: Buffer;
    try {
      data = await fetchBytes(url, this.fetchFn);
      if (!UNCHECKED_EXTENSIONS.has(path.extname(baseName).toLowerCase())) {
        await sharp(data).metadata();
      }
    } catch (error) {
      this.logger.warn(`Failed to download image ${url}: ${getErrorMessage(error)}`);
      this.failed.add(url);
      return null;
    }

    const fileName = this.uniqueFileName(baseName || `img_${this.entries.size}`);
    const entry: ImageEntry = { url, fileName, mediaType: guessMediaType(fileName), data };
    this.entries.set(url, entry);
    this.logger.debug(`Stored ${url} as ${fileName}`);
    return entry;
  }

  private uniqueFileName(baseName: string): string {
    const taken = new Set([...this.entries.values()].map((entry) => entry.fileName));
    const ext = path.extname(baseName);
    const stem = baseName.slice(0, baseName.length - ext.length);

    let candidate = `${IMAGES_DIR}/${baseName}`;
    for (let counter = 1; taken.has(candidate); counter++) {
      candidate = `${IMAGES_DIR}/${stem}_${counter}${ext}`;
    }
    return candidate;
  }
}
