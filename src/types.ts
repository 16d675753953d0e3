export interface CompressionConfig {
  maxDimension: number;
  quality: number;
}

export type NativeFormat = "jpeg" | "png" | "other";

export interface Dimensions {
  width: number;
  height: number;
}

export type CompressOutcome =
  | {
      status: "compressed";
      file: string;
      outputPath: string;
      format: NativeFormat;
      from: Dimensions;
      to: Dimensions;
      inputBytes: number;
      outputBytes: number;
    }
  | { status: "skipped"; file: string; format: NativeFormat; dimensions: Dimensions }
  | { status: "error"; file: string; error: string };

export interface RunStats {
  totalFound: number;
  compressed: number;
  skipped: number;
  failures: FailedFile[];
  totalBytes: number;
  savedBytes: number;
  startTime: number | null;
  endTime: number | null;
}

export interface RunSummary {
  totalFound: number;
  compressed: number;
  skipped: number;
  failed: number;
  failures: FailedFile[];
  duration: string;
  totalSize: string;
  savedSize: string;
  compressionRatio: string;
}

export interface FailedFile {
  file: string;
  error: string;
}

export interface Logger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ParsedArgs {
  path?: string;
  quality: number;
  size: number;
  help: boolean;
  version: boolean;
}
