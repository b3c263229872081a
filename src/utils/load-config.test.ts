import { describe, it, expect } from "vitest";
import { z } from "zod";
import {
  describeConfigError,
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
} from "./load-config";
import { ConversionConfigSchema, MAX_TIMEOUT_MS } from "../types";

describe("loadDefaultConfig", () => {
  it("loads the bundled defaults", async () => {
    const config = await loadDefaultConfig();

    expect(config.converter).toEqual({
      backend: "docling",
      format: "markdown",
      images: true,
      language: "en",
      timeout: 0,
    });
    expect(config.workers).toEqual({ cuda: 2, mps: 2, none: 4 });
  });
});

describe("ConversionConfigSchema", () => {
  it("accepts timeouts up to the largest timer delay only", async () => {
    const base = await loadDefaultConfig();
    const withTimeout = (timeout: number) => ({
      ...base,
      converter: { ...base.converter, timeout },
    });

    expect(ConversionConfigSchema.safeParse(withTimeout(MAX_TIMEOUT_MS)).success).toBe(true);
    expect(ConversionConfigSchema.safeParse(withTimeout(3_000_000_000)).success).toBe(false);
  });
});

describe("mergeConfig", () => {
  it("overrides nested sections key by key", async () => {
    const base = await loadDefaultConfig();

    const merged = mergeConfig(base, {
      output: "out",
      converter: { backend: "marker" },
      workers: { max: 3 },
      backends: { docling: { executable: "/opt/docling/bin/docling" } },
    });

    expect(merged.output).toBe("out");
    expect(merged.input).toBe(base.input);
    expect(merged.converter).toEqual({ ...base.converter, backend: "marker" });
    expect(merged.workers).toEqual({ cuda: 2, mps: 2, none: 4, max: 3 });
    expect(merged.backends.docling).toEqual({
      executable: "/opt/docling/bin/docling",
      args: [],
    });
    expect(merged.backends.marker).toEqual(base.backends.marker);
  });
});

describe("loadConfig", () => {
  it("reports an unreadable custom config and keeps going", async () => {
    const { config, errors } = await loadConfig("/nonexistent/docbatch.json");

    expect(config.converter.backend).toBe("docling");
    expect(errors.map((e) => e.path)).toContain("/nonexistent/docbatch.json");
  });
});

describe("describeConfigError", () => {
  it("lists zod issues by path", () => {
    const result = z
      .object({ workers: z.object({ none: z.number() }) })
      .safeParse({ workers: { none: "four" } });

    expect(describeConfigError(result.error)).toMatch(/^workers\.none: /);
  });

  it("falls back to the error message", () => {
    expect(describeConfigError(new Error("Unexpected token"))).toBe(
      "Unexpected token",
    );
  });
});
