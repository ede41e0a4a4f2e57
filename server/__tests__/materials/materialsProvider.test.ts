import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { FileMaterialsProvider } from "../../materials/materialsProvider";

describe("FileMaterialsProvider", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "lecture-materials-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("joins text materials under a header per file", async () => {
    await fs.writeFile(path.join(dir, "syllabus.md"), "# Week 1\nLimits\n");
    await fs.writeFile(path.join(dir, "glossary.TXT"), "  derivative: rate of change  ");

    const text = await new FileMaterialsProvider().load([
      path.join(dir, "syllabus.md"),
      path.join(dir, "glossary.TXT"),
    ]);

    expect(text).toBe(
      "=== Material: syllabus.md ===\n# Week 1\nLimits\n\n=== Material: glossary.TXT ===\nderivative: rate of change"
    );
  });

  it("skips unsupported, empty and missing files", async () => {
    await fs.writeFile(path.join(dir, "slides.pdf"), "%PDF");
    await fs.writeFile(path.join(dir, "empty.txt"), "   \n");

    const text = await new FileMaterialsProvider().load([
      path.join(dir, "slides.pdf"),
      path.join(dir, "empty.txt"),
      path.join(dir, "missing.md"),
    ]);

    expect(text).toBe("");
  });
});
