import path from "node:path";
import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import type { Dimensions, Logger, NativeFormat } from "./types.js";

export const IMAGE_EXTENSIONS = ["jpg", "jpeg", "png", "gif", "bmp", "tiff", "webp", "avif", "heic"];

export function isImageFile(filePath: string): boolean {
  const ext = path.extname(filePath).toLowerCase().slice(1);
  return IMAGE_EXTENSIONS.includes(ext);
}

/** Maps the format sharp detected from the file content onto a save strategy. */
export function classifyFormat(detected: string | undefined): NativeFormat {
  switch (detected) {
    case "jpeg":
    case "jpg":
      return "jpeg";
    case "png":
      return "png";
    default:
      return "other";
  }
}

/** True for Windows bitmaps, which start with the bytes "BM". */
export function isBitmap(buffer: Buffer): boolean {
  return buffer.length >= 2 && buffer[0] === 0x42 && buffer[1] === 0x4d;
}

export function exceedsBound({ width, height }: Dimensions, maxDimension: number): boolean {
  return width > maxDimension || height > maxDimension;
}

/**
 * Scales the longer side down to `maxDimension` and the other side in
 * proportion, truncating. Square images take the height branch.
 */
export function computeTargetSize({ width, height }: Dimensions, maxDimension: number): Dimensions {
  if (width > height) {
    return { width: maxDimension, height: Math.trunc((height * maxDimension) / width) };
  }
  return { width: Math.trunc((width * maxDimension) / height), height: maxDimension };
}

export function siblingJpegPath(filePath: string): string {
  return path.join(path.dirname(filePath), `${path.parse(filePath).name}.jpg`);
}

/**
 * Yields every regular file below `dir`, one directory listing at a time.
 * Symlinks are followed to files but never into directories.
 */
export async function* walkFiles(dir: string, logger: Logger): AsyncGenerator<string> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn(`Warning: cannot read directory ${dir}: ${message}`);
    return;
  }

  logger.log(`Scanning directory: ${dir}`);
  const subdirs: string[] = [];

  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      subdirs.push(entryPath);
    } else if (entry.isFile()) {
      yield entryPath;
    } else if (entry.isSymbolicLink() && (await isLinkToFile(entryPath))) {
      yield entryPath;
    }
  }

  for (const subdir of subdirs) {
    yield* walkFiles(subdir, logger);
  }
}

async function isLinkToFile(linkPath: string): Promise<boolean> {
  return fs
    .stat(linkPath)
    .then((stats) => stats.isFile())
    .catch(() => false);
}

export function formatBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB"];
  let size = Math.abs(bytes);
  let unit = 0;

  while (size >= 1024 && unit < units.length - 1) {
    size /= 1024;
    unit++;
  }

  return `${bytes < 0 ? "-" : ""}${size.toFixed(2)} ${units[unit]}`;
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  return minutes > 0 ? `${minutes}m ${seconds % 60}s` : `${seconds}s`;
}
