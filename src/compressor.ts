import sharp from "sharp";
import { Jimp } from "jimp";
import path from "node:path";
import fs from "node:fs/promises";
import fsSync from "node:fs";
import crypto from "node:crypto";
import {
  classifyFormat,
  computeTargetSize,
  exceedsBound,
  formatBytes,
  formatDuration,
  isBitmap,
  isImageFile,
  siblingJpegPath,
  walkFiles,
} from "./utils.js";
import type {
  CompressionConfig,
  CompressOutcome,
  Dimensions,
  Logger,
  NativeFormat,
  RunStats,
  RunSummary,
} from "./types.js";

export const DEFAULT_CONFIG: CompressionConfig = {
  maxDimension: 720,
  quality: 85,
};

// 16384 x 16384
const MAX_INPUT_PIXELS = 268402689;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function createStats(): RunStats {
  return {
    totalFound: 0,
    compressed: 0,
    skipped: 0,
    failures: [],
    totalBytes: 0,
    savedBytes: 0,
    startTime: null,
    endTime: null,
  };
}

export class ImageCompressor {
  config: CompressionConfig;
  private logger: Logger;

  constructor(config: Partial<CompressionConfig> = {}, logger: Logger = console) {
    const { maxDimension, quality } = { ...DEFAULT_CONFIG, ...config };
    this.config = {
      maxDimension: Math.max(1, Math.floor(maxDimension)),
      quality: Math.max(0, Math.min(Math.round(quality), 100)),
    };
    this.logger = logger;
  }

  async processDirectory(rootPath: string): Promise<RunSummary> {
    const stats = createStats();
    stats.startTime = Date.now();

    const isDirectory = await fs
      .stat(rootPath)
      .then((stat) => stat.isDirectory())
      .catch(() => false);

    if (!isDirectory) {
      this.logger.error(`Error: Directory '${rootPath}' not found.`);
      stats.endTime = Date.now();
      return this.buildSummary(stats);
    }

    this.logger.log(`Starting image compression in: ${rootPath} and all subdirectories`);
    this.logger.log(`Only compressing images with dimensions greater than ${this.config.maxDimension}px`);

    for await (const filePath of walkFiles(rootPath, this.logger)) {
      if (!isImageFile(filePath)) continue;

      this.logger.log(`Found image: ${filePath}`);
      stats.totalFound++;

      try {
        this.record(stats, await this.compressImage(filePath));
      } catch (err) {
        const message = errorMessage(err);
        this.logger.error(`Error processing ${filePath}: ${message}`);
        stats.failures.push({ file: filePath, error: message });
      }
    }

    stats.endTime = Date.now();
    return this.buildSummary(stats);
  }

  async compressImage(inputPath: string): Promise<CompressOutcome> {
    try {
      await fs.access(inputPath, fsSync.constants.R_OK);
    } catch {
      return this.fail(inputPath, `Cannot read file ${inputPath} - check permissions`);
    }

    let tempOutput: string | undefined;

    try {
      // Decode from memory so the path is free to be replaced below
      const input = await fs.readFile(inputPath);
      const image = await this.decode(input);

      const metadata = await image.metadata();
      if (!metadata.width || !metadata.height) {
        throw new Error("Could not read image dimensions");
      }

      const format = classifyFormat(metadata.format);
      // EXIF orientations 5-8 are stored rotated by 90 degrees
      const swapped = (metadata.orientation ?? 1) >= 5;
      const from: Dimensions = swapped
        ? { width: metadata.height, height: metadata.width }
        : { width: metadata.width, height: metadata.height };

      if (!exceedsBound(from, this.config.maxDimension)) {
        this.logger.log(
          `Skipped: ${inputPath} (dimensions ${from.width}x${from.height} do not exceed ${this.config.maxDimension}px)`
        );
        return { status: "skipped", file: inputPath, format, dimensions: from };
      }

      const to = computeTargetSize(from, this.config.maxDimension);
      const outputPath = format === "other" ? siblingJpegPath(inputPath) : inputPath;

      tempOutput = path.join(
        path.dirname(outputPath),
        `.downsize-${crypto.randomBytes(8).toString("hex")}${path.extname(outputPath)}`
      );

      const resized = image.rotate().resize(to.width, to.height, {
        fit: "fill",
        kernel: "lanczos3",
      });

      await this.encode(resized, format).toFile(tempOutput);

      const tempStats = await fs.stat(tempOutput);
      if (tempStats.size === 0) {
        throw new Error("Generated file is empty");
      }

      try {
        const outputLstat = await fs.lstat(outputPath);
        if (outputLstat.isSymbolicLink()) {
          throw new Error("Output path is a symbolic link, refusing to overwrite");
        }
      } catch (e) {
        if ((e as NodeJS.ErrnoException).code !== "ENOENT") throw e;
      }

      await fs.rename(tempOutput, outputPath);
      tempOutput = undefined;

      this.logger.log(
        `Successfully compressed: ${outputPath} from ${from.width}x${from.height} to ${to.width}x${to.height}`
      );

      return {
        status: "compressed",
        file: inputPath,
        outputPath,
        format,
        from,
        to,
        inputBytes: input.length,
        outputBytes: tempStats.size,
      };
    } catch (err) {
      if (tempOutput) {
        await fs.rm(tempOutput, { force: true }).catch((cleanupErr: unknown) => {
          this.logger.warn(`Warning: could not remove ${tempOutput}: ${errorMessage(cleanupErr)}`);
        });
      }
      return this.fail(inputPath, errorMessage(err));
    }
  }

  private async decode(input: Buffer): Promise<sharp.Sharp> {
    if (!isBitmap(input)) {
      return sharp(input, {
        failOn: "error",
        limitInputPixels: MAX_INPUT_PIXELS,
      });
    }

    // libvips has no BMP loader; jimp hands back RGBA pixels instead
    const { data, width, height } = (await Jimp.fromBuffer(input)).bitmap;

    // Keep the colour channels only, the fallback encoder drops alpha anyway
    const rgb = Buffer.alloc(width * height * 3);
    for (let src = 0, dst = 0; dst < rgb.length; src += 4, dst += 3) {
      data.copy(rgb, dst, src, src + 3);
    }

    return sharp(rgb, {
      raw: { width, height, channels: 3 },
      limitInputPixels: MAX_INPUT_PIXELS,
    });
  }

  private encode(pipeline: sharp.Sharp, format: NativeFormat): sharp.Sharp {
    // libvips rejects a JPEG quality of 0
    const quality = Math.max(1, this.config.quality);

    switch (format) {
      case "jpeg":
        return pipeline.jpeg({ quality, optimiseCoding: true });
      case "png":
        return pipeline.png({ compressionLevel: 9, adaptiveFiltering: true });
      case "other":
        return pipeline
          .removeAlpha()
          .toColourspace("srgb")
          .jpeg({ quality, optimiseCoding: true });
    }
  }

  private fail(file: string, error: string): CompressOutcome {
    this.logger.error(`Error processing ${file}: ${error}`);
    return { status: "error", file, error };
  }

  private record(stats: RunStats, outcome: CompressOutcome): void {
    switch (outcome.status) {
      case "compressed":
        stats.compressed++;
        stats.totalBytes += outcome.inputBytes;
        stats.savedBytes += outcome.inputBytes - outcome.outputBytes;
        break;
      case "skipped":
        stats.skipped++;
        break;
      case "error":
        stats.failures.push({ file: outcome.file, error: outcome.error });
        break;
    }
  }

  private buildSummary(stats: RunStats): RunSummary {
    const duration = stats.startTime && stats.endTime
      ? formatDuration(stats.endTime - stats.startTime)
      : "0s";

    const ratio = stats.totalBytes > 0
      ? ((stats.savedBytes / stats.totalBytes) * 100).toFixed(2) + "%"
      : "0%";

    return {
      totalFound: stats.totalFound,
      compressed: stats.compressed,
      skipped: stats.skipped,
      failed: stats.failures.length,
      failures: stats.failures,
      duration,
      totalSize: formatBytes(stats.totalBytes),
      savedSize: formatBytes(stats.savedBytes),
      compressionRatio: ratio,
    };
  }
}
