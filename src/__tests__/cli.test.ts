import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { execFile } from "node:child_process";
import { promisify } from "node:util";
import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import sharp from "sharp";

const exec = promisify(execFile);

// Use tsx to run the TypeScript source directly
const CLI = path.resolve("src/index.ts");
const TSX = path.resolve("node_modules/.bin/tsx");

function tmpDir(): string {
  return path.join(os.tmpdir(), `downsize-cli-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
}

async function createTestPng(filePath: string, width: number, height: number): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await sharp({
    create: { width, height, channels: 3, background: { r: 255, g: 0, b: 0 } },
  })
    .png()
    .toFile(filePath);
}

async function cleanup(dir: string): Promise<void> {
  try {
    await fs.rm(dir, { recursive: true, force: true });
  } catch {
    // ignore
  }
}

describe("CLI", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = tmpDir();
    await fs.mkdir(workDir, { recursive: true });
  });

  afterEach(async () => {
    await cleanup(workDir);
  });

  it("prints help with --help", async () => {
    const { stdout } = await exec(TSX, [CLI, "--help"]);
    expect(stdout).toContain("downsize");
    expect(stdout).toContain("Usage:");
    expect(stdout).toContain("--size");
  });

  it("prints version with --version", async () => {
    const { stdout } = await exec(TSX, [CLI, "--version"]);
    expect(stdout.trim()).toMatch(/^\d+\.\d+\.\d+$/);
  });

  it("resizes a directory given with --path", async () => {
    await createTestPng(path.join(workDir, "big.png"), 1000, 800);
    await createTestPng(path.join(workDir, "nested", "small.png"), 100, 100);

    const { stdout } = await exec(TSX, [CLI, "--size", "500", "--quality=70", "--path", workDir]);
    expect(stdout).toContain("Processing complete!");
    expect(stdout).toContain("Total images found:      2");
    expect(stdout).toContain("Successfully compressed: 1");
    expect(stdout).toContain("Failed:                  0");

    const metadata = await sharp(await fs.readFile(path.join(workDir, "big.png"))).metadata();
    expect(metadata.width).toBe(500);
    expect(metadata.height).toBe(400);
  });

  it("prompts for the directory when --path is omitted", async () => {
    await createTestPng(path.join(workDir, "photo.png"), 40, 30);

    const run = exec(TSX, [CLI]);
    run.child.stdin?.end(`${workDir}\n`);
    const { stdout } = await run;

    expect(stdout).toContain("Enter the path to the folder containing images: ");
    expect(stdout).toContain(`Processing directory: ${workDir}`);
    expect(stdout).toContain("Total images found:      1");
  });

  it("exits with error when input ends before a directory is entered", async () => {
    const run = exec(TSX, [CLI]);
    run.child.stdin?.end();
    try {
      await run;
      expect.fail("should have thrown");
    } catch (err: unknown) {
      const error = err as { code: number; stdout: string; stderr: string };
      expect(error.code).toBe(1);
      expect(error.stdout).toContain("Enter the path to the folder containing images: ");
      expect(error.stderr).toContain("Error: no directory entered");
    }
  });

  it("exits with error on a missing directory", async () => {
    const missing = path.join(workDir, "nope");
    try {
      await exec(TSX, [CLI, "--path", missing]);
      expect.fail("should have thrown");
    } catch (err: unknown) {
      const error = err as { code: number; stderr: string };
      expect(error.code).toBe(1);
      expect(error.stderr).toContain(`Error: Directory '${missing}' not found.`);
    }
  });

  it("exits with error on unknown flag", async () => {
    try {
      await exec(TSX, [CLI, "--badopt"]);
      expect.fail("should have thrown");
    } catch (err: unknown) {
      const error = err as { code: number; stderr: string };
      expect(error.code).toBe(1);
      expect(error.stderr).toContain("unknown option");
    }
  });

  it("exits with error on a non-numeric size", async () => {
    try {
      await exec(TSX, [CLI, "--size", "big", "--path", workDir]);
      expect.fail("should have thrown");
    } catch (err: unknown) {
      const error = err as { code: number; stderr: string };
      expect(error.code).toBe(1);
      expect(error.stderr).toContain("invalid --size value: big");
    }
  });
});
