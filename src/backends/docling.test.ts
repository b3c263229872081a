import { describe, it, expect, vi } from "vitest";
import { mkdir, writeFile } from "fs/promises";
import { join } from "node:path";
import { DoclingConverter, type DoclingOptions } from "./docling";
import { fileExists } from "../utils/file-exists";
import type { CommandRunner } from "../utils/run-command";

const SETTINGS = { executable: "docling", args: ["--num-threads", "4"] };

function optionValue(args: readonly string[], flag: string): string {
  const value = args[args.indexOf(flag) + 1];
  if (value === undefined) {
    throw new Error(`missing ${flag}`);
  }
  return value;
}

// Writes what docling leaves in --output for /docs/report.pdf
const fakeDocling = vi.fn<CommandRunner>(async (_executable, args) => {
  const out = optionValue(args, "--output");
  await mkdir(join(out, "report_artifacts"));
  await writeFile(
    join(out, "report.md"),
    `# Report\n\n![Image](${out}/report_artifacts/image_000000_abc.png)\n`,
  );
  await writeFile(join(out, "report.txt"), "Report\n");
  await writeFile(
    join(out, "report_artifacts", "image_000000_abc.png"),
    Uint8Array.from([137, 80]),
  );
  return { stdout: "", stderr: "" };
});

function converter(overrides: Partial<DoclingOptions> = {}): DoclingConverter {
  return new DoclingConverter({
    settings: SETTINGS,
    format: "markdown",
    images: true,
    language: "en",
    device: "none",
    run: fakeDocling,
    ...overrides,
  });
}

describe("DoclingConverter", () => {
  describe("buildArgs", () => {
    it("asks for referenced images and markdown", () => {
      expect(converter().buildArgs("/docs/report.pdf", "/scratch")).toEqual([
        "/docs/report.pdf",
        "--output",
        "/scratch",
        "--image-export-mode",
        "referenced",
        "--device",
        "cpu",
        "--to",
        "md",
        "--ocr-lang",
        "en",
        "--num-threads",
        "4",
      ]);
    });

    it("asks for both serializations and placeholders", () => {
      const args = converter({ format: "both", images: false, language: "", device: "cuda" })
        .buildArgs("/docs/report.pdf", "/scratch");

      expect(args).toEqual([
        "/docs/report.pdf",
        "--output",
        "/scratch",
        "--image-export-mode",
        "placeholder",
        "--device",
        "cuda",
        "--to",
        "md",
        "--to",
        "text",
        "--num-threads",
        "4",
      ]);
    });
  });

  describe("convert", () => {
    it("loads markdown with relative image links and the assets", async () => {
      const document = await converter().convert("/docs/report.pdf");

      expect(document.markdown).toBe(
        "# Report\n\n![Image](report_artifacts/image_000000_abc.png)\n",
      );
      expect(document.text).toBeUndefined();
      expect(document.assets.map((asset) => asset.path)).toEqual([
        "report_artifacts/image_000000_abc.png",
      ]);
      expect(Array.from(document.assets[0]?.data ?? [])).toEqual([137, 80]);
    });

    it("loads the text serialization when asked", async () => {
      const document = await converter({ format: "text", images: false }).convert(
        "/docs/report.pdf",
      );

      expect(document).toEqual({ text: "Report\n", pages: [], assets: [] });
    });

    it("passes the abort signal and config key to the runner", async () => {
      const controller = new AbortController();

      await converter().convert("/docs/report.pdf", { signal: controller.signal });

      expect(fakeDocling).toHaveBeenLastCalledWith("docling", expect.any(Array), {
        signal: controller.signal,
        configKey: "backends.docling.executable",
      });
    });

    it("removes its scratch directory", async () => {
      await converter().convert("/docs/report.pdf");

      const args = fakeDocling.mock.lastCall?.[1] ?? [];
      expect(await fileExists(optionValue(args, "--output"))).toBe(false);
    });

    it("propagates engine failures", async () => {
      const run = vi
        .fn<CommandRunner>()
        .mockRejectedValue(new Error("docling exited with code 1: bad PDF"));

      await expect(converter({ run }).convert("/docs/report.pdf")).rejects.toThrow(
        "docling exited with code 1: bad PDF",
      );
    });
  });
});
