import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { HtmlConverter } from "./html";

const PAGE = `<!doctype html>
<html>
  <head><title>Ignored</title><style>p { color: red; }</style></head>
  <body>
    <h1>Field Notes</h1>
    <p>First <strong>bold</strong> line.</p>
    <p><img src="img/plot%201.png" alt=""></p>
    <p><a href="img/big.png"><img src="img/big.png" alt="Big"></a></p>
    <p><img src="https://cdn.example.test/remote.png"></p>
    <p><img src="other/big.png"></p>
    <script>window.tracked = true;</script>
  </body>
</html>`;

describe("HtmlConverter", () => {
  let dir: string;
  let sourcePath: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "docbatch-html-"));
    sourcePath = join(dir, "page.html");
    await mkdir(join(dir, "img"));
    await mkdir(join(dir, "other"));
    await writeFile(join(dir, "img", "plot 1.png"), Uint8Array.from([1]));
    await writeFile(join(dir, "img", "big.png"), Uint8Array.from([2]));
    await writeFile(join(dir, "other", "big.png"), Uint8Array.from([3]));
    await writeFile(join(dir, "img", "my fig.png"), Uint8Array.from([4]));
    await writeFile(sourcePath, PAGE);
    await writeFile(
      join(dir, "chart.html"),
      '<body><p><img src="img/my%20fig.png" alt="Chart"></p></body>',
    );
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("converts the body to markdown", async () => {
    const document = await new HtmlConverter({ images: true }).convert(sourcePath);

    expect(document.markdown).toContain("# Field Notes\n\nFirst **bold** line.");
    expect(document.markdown).not.toContain("Ignored");
    expect(document.markdown).not.toContain("tracked");
  });

  it("copies local images and relinks them", async () => {
    const document = await new HtmlConverter({ images: true }).convert(sourcePath);

    expect(document.assets.map((asset) => asset.path)).toEqual([
      "page_artifacts/plot 1.png",
      "page_artifacts/big.png",
      "page_artifacts/big-1.png",
    ]);
    expect(document.assets.map((asset) => Array.from(asset.data))).toEqual([
      [1],
      [2],
      [3],
    ]);
    expect(document.markdown).toContain("![Image](page_artifacts/plot%201.png)");
    expect(document.markdown).toContain("![Big](page_artifacts/big.png)");
    expect(document.markdown).toContain("![Image](page_artifacts/big-1.png)");
    expect(document.markdown).toContain(
      "![Image](https://cdn.example.test/remote.png)",
    );
  });

  it("encodes local links whatever the alt text", async () => {
    const document = await new HtmlConverter({ images: true }).convert(
      join(dir, "chart.html"),
    );

    expect(document.assets.map((asset) => asset.path)).toEqual([
      "chart_artifacts/my fig.png",
    ]);
    expect(document.markdown).toBe("![Chart](chart_artifacts/my%20fig.png)\n");
  });

  it("keeps original links when images are off", async () => {
    const document = await new HtmlConverter({ images: false }).convert(sourcePath);

    expect(document.assets).toEqual([]);
    expect(document.markdown).toContain("![Image](img/plot%201.png)");
  });

  it("extracts one line of text per block", async () => {
    const document = await new HtmlConverter({ images: false }).convert(sourcePath);

    expect(document.text).toBe("Field Notes\nFirst bold line.");
  });
});
