#!/usr/bin/env node

import { createRequire } from "node:module";
import fs from "node:fs/promises";
import readline from "node:readline";
import { DEFAULT_CONFIG, ImageCompressor } from "./compressor.js";
import type { ParsedArgs } from "./types.js";

const require = createRequire(import.meta.url);
const { version: VERSION } = require("../package.json") as { version: string };

const HELP = `
downsize v${VERSION}: Shrink oversized images in place

Usage:
  downsize --path <dir>               Resize every image under dir (recursively)
  downsize                            Prompt for the directory
  downsize -s 1080 -q 80 -p <dir>     Custom bound and JPEG quality

Options:
  -p, --path <dir>     Folder containing images (prompted for when omitted)
  -s, --size <n>       Maximum width or height in pixels (default: ${DEFAULT_CONFIG.maxDimension})
  -q, --quality <n>    JPEG quality 0-100 (default: ${DEFAULT_CONFIG.quality})
  -h, --help           Show this help message
  -v, --version        Show version number

Images whose longer side exceeds --size are scaled down and overwritten.
JPEG and PNG keep their format; other formats are saved beside the
original as <name>.jpg.

Supported extensions: jpg, jpeg, png, gif, bmp, tiff, webp, avif, heic
`.trim();

const PROMPT = "Enter the path to the folder containing images: ";

function usageError(message: string): never {
  console.error(`Error: ${message}`);
  console.error("Run downsize --help for usage");
  process.exit(1);
}

function parseInteger(flag: string, value: string | undefined): number {
  if (value === undefined) {
    usageError(`${flag} requires a numeric argument`);
  }
  const val = Number(value);
  if (value.trim() === "" || !Number.isInteger(val)) {
    usageError(`invalid ${flag} value: ${value}`);
  }
  return val;
}

function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const result: ParsedArgs = {
    quality: DEFAULT_CONFIG.quality,
    size: DEFAULT_CONFIG.maxDimension,
    help: false,
    version: false,
  };

  for (let i = 0; i < args.length; i++) {
    const [arg, inline] = splitInline(args[i]);
    const takeValue = (): string | undefined => inline ?? args[++i];

    if (arg === "-h" || arg === "--help") {
      result.help = true;
      return result;
    }

    if (arg === "-v" || arg === "--version") {
      result.version = true;
      return result;
    }

    if (arg === "-q" || arg === "--quality") {
      // Clamp to 0-100
      result.quality = Math.max(0, Math.min(parseInteger("--quality", takeValue()), 100));
      continue;
    }

    if (arg === "-s" || arg === "--size") {
      const size = parseInteger("--size", takeValue());
      if (size < 1) {
        usageError(`--size must be a positive number of pixels: ${size}`);
      }
      result.size = size;
      continue;
    }

    if (arg === "-p" || arg === "--path") {
      const next = takeValue();
      if (next === undefined) {
        usageError("--path requires a directory argument");
      }
      result.path = next;
      continue;
    }

    if (arg.startsWith("-")) {
      usageError(`unknown option: ${arg}`);
    }

    usageError(`unexpected argument: ${arg}`);
  }

  return result;
}

function splitInline(arg: string): [string, string | undefined] {
  const eq = arg.indexOf("=");
  if (!arg.startsWith("--") || eq === -1) return [arg, undefined];
  return [arg.slice(0, eq), arg.slice(eq + 1)];
}

function cancel(): never {
  console.log("\nOperation cancelled by user.");
  process.exit(130);
}

function promptForDirectory(): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  rl.on("SIGINT", cancel);

  return new Promise((resolve) => {
    let answered = false;

    // Input ended (Ctrl-D or a closed pipe) before a line arrived
    rl.on("close", () => {
      if (!answered) {
        console.error("\nError: no directory entered");
        process.exit(1);
      }
    });

    rl.question(PROMPT, (answer) => {
      answered = true;
      rl.close();
      resolve(answer.trim());
    });
  });
}

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv);

  if (parsed.help) {
    console.log(HELP);
    return;
  }

  if (parsed.version) {
    console.log(VERSION);
    return;
  }

  process.on("SIGINT", cancel);

  const directory = parsed.path ?? (await promptForDirectory());

  const isDirectory = await fs
    .stat(directory)
    .then((stat) => stat.isDirectory())
    .catch(() => false);

  if (!isDirectory) {
    console.error(`Error: Directory '${directory}' not found.`);
    process.exit(1);
  }

  console.log(`Processing directory: ${directory}`);

  const compressor = new ImageCompressor({ maxDimension: parsed.size, quality: parsed.quality });
  const results = await compressor.processDirectory(directory);

  console.log("\nProcessing complete!");
  console.log(`  Total images found:      ${results.totalFound}`);
  console.log(`  Successfully compressed: ${results.compressed}`);
  console.log(`  Skipped (under ${compressor.config.maxDimension}px):  ${results.skipped}`);
  console.log(`  Failed:                  ${results.failed}`);
  console.log(`  Duration:                ${results.duration}`);
  console.log(`  Compressed input size:   ${results.totalSize}`);
  console.log(`  Saved:                   ${results.savedSize} (${results.compressionRatio})`);

  if (results.failures.length > 0) {
    console.log("\nFailed images:");
    results.failures.forEach((f) => console.log(`  - ${f.file}: ${f.error}`));
  }
}

main().catch((err) => {
  console.error("An error occurred:", err instanceof Error ? (err.stack ?? err.message) : String(err));
  process.exit(1);
});
