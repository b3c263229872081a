import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { scan } from "./scanner";
import { DiscoveryError } from "../errors";

describe("scan", () => {
  let inputDir: string;

  beforeAll(async () => {
    inputDir = await mkdtemp(join(tmpdir(), "docbatch-scan-"));
    for (const name of ["gamma.pdf", "alpha.PDF", "beta.pdf", "notes.txt"]) {
      await writeFile(join(inputDir, name), "");
    }
    await mkdir(join(inputDir, "nested"));
    await writeFile(join(inputDir, "nested", "inner.pdf"), "");
  });

  afterAll(async () => {
    await rm(inputDir, { recursive: true, force: true });
  });

  it("finds matching files at the top level only, sorted by name", async () => {
    const items = await scan(inputDir, "out", [".pdf"]);

    expect(items.map((item) => item.name)).toEqual([
      "alpha.PDF",
      "beta.pdf",
      "gamma.pdf",
    ]);
  });

  it("builds frozen work items with stem and destination", async () => {
    const [first] = await scan(inputDir, "/tmp/results", ["pdf"]);

    expect(first).toEqual({
      name: "alpha.PDF",
      stem: "alpha",
      sourcePath: join(inputDir, "alpha.PDF"),
      destinationDir: "/tmp/results",
    });
    expect(Object.isFrozen(first)).toBe(true);
  });

  it("accepts several extensions", async () => {
    const items = await scan(inputDir, "out", [".txt", ".pdf"]);

    expect(items.map((item) => item.stem)).toEqual([
      "alpha",
      "beta",
      "gamma",
      "notes",
    ]);
  });

  it("returns an empty list when nothing matches", async () => {
    expect(await scan(inputDir, "out", [".html"])).toEqual([]);
  });

  it("rejects a missing input directory", async () => {
    const missing = join(inputDir, "does-not-exist");

    await expect(scan(missing, "out", [".pdf"])).rejects.toThrow(
      new DiscoveryError(missing, `Input directory not found: ${missing}`),
    );
  });

  it("rejects an input path that is a file", async () => {
    const file = join(inputDir, "notes.txt");

    const error = await scan(file, "out", [".pdf"]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DiscoveryError);
    expect(error).toMatchObject({
      inputDir: file,
      message: `Input path is not a directory: ${file}`,
    });
  });

  it("gives files sharing a stem their own output names", async () => {
    const dir = await mkdtemp(join(tmpdir(), "docbatch-scan-stems-"));
    try {
      for (const name of ["page.html", "page.htm", "other.html"]) {
        await writeFile(join(dir, name), "");
      }

      const items = await scan(dir, "out", [".html", ".htm"]);

      expect(items.map((item) => [item.name, item.stem])).toEqual([
        ["other.html", "other"],
        ["page.htm", "page"],
        ["page.html", "page-1"],
      ]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("skips suffixes that another file already uses as its stem", async () => {
    const dir = await mkdtemp(join(tmpdir(), "docbatch-scan-stems-"));
    try {
      for (const name of ["page.htm", "page.html", "page-1.html"]) {
        await writeFile(join(dir, name), "");
      }

      const items = await scan(dir, "out", [".html", ".htm"]);
      const stems = items.map((item) => item.stem);

      expect(new Set(stems).size).toBe(3);
      expect(stems).toContain("page-1");
      expect(stems).toContain("page");
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
