import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { runCli, type CliOutput } from "../../src/cli/program.js";
import { PNG_BYTES } from "../helpers.js";

function capture(): CliOutput & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return { out, err, log: (line) => out.push(line), error: (line) => err.push(line) };
}

const INLINE_IMAGE_JSON = JSON.stringify({
  elements: [{ Image: { bytes: PNG_BYTES.toString("base64"), image_type: "Png" } }],
});

describe("runCli", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "polydoc-cli-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("converts a file, detecting the input format from its name", async () => {
    await writeFile(join(dir, "in.md"), "# Title\n\nBody paragraph.\n");
    const output = capture();
    const code = await runCli(
      ["--input-file", join(dir, "in.md"), "--output-file", join(dir, "out.txt"), "--output-format", "txt"],
      output,
    );
    expect(code).toBe(0);
    expect(await readFile(join(dir, "out.txt"), "utf-8")).toBe("Title\nBody paragraph.\n");
    expect(output.err).toEqual([]);
  });

  it("honours an explicit input format", async () => {
    await writeFile(join(dir, "data"), "a,b\n1,2\n");
    const code = await runCli(
      [
        "--input-file",
        join(dir, "data"),
        "--input-format",
        "csv",
        "--output-file",
        join(dir, "out.md"),
        "--output-format",
        "Markdown",
      ],
      capture(),
    );
    expect(code).toBe(0);
    expect(await readFile(join(dir, "out.md"), "utf-8")).toBe("| a | b |\n| --- | --- |\n| 1 | 2 |\n");
  });

  it("reads images beside the input file", async () => {
    await writeFile(join(dir, "pic.png"), PNG_BYTES);
    await writeFile(join(dir, "in.md"), "![pic](pic.png)\n");
    const code = await runCli(
      ["--input-file", join(dir, "in.md"), "--output-file", join(dir, "out.html"), "--output-format", "html"],
      capture(),
    );
    expect(code).toBe(0);
    expect(await readFile(join(dir, "out.html"), "utf-8")).toContain('<p><img src="pic.png" alt="pic"></p>');
  });

  it("writes externalized images to the image directory", async () => {
    await writeFile(join(dir, "in.json"), INLINE_IMAGE_JSON);
    const images = join(dir, "images");
    const code = await runCli(
      [
        "--input-file",
        join(dir, "in.json"),
        "--output-file",
        join(dir, "out.md"),
        "--output-format",
        "md",
        "--image-dir",
        images,
      ],
      capture(),
    );
    expect(code).toBe(0);
    expect(await readFile(join(dir, "out.md"), "utf-8")).toBe("![](image0.png)\n");
    expect((await readFile(join(images, "image0.png"))).equals(PNG_BYTES)).toBe(true);
  });

  it("writes images kept by key beside the output", async () => {
    await writeFile(join(dir, "pic.png"), PNG_BYTES);
    await writeFile(join(dir, "in.md"), "![pic](pic.png)\n");
    await mkdir(join(dir, "out"));
    const code = await runCli(
      ["--input-file", join(dir, "in.md"), "--output-file", join(dir, "out", "doc.json"), "--output-format", "json"],
      capture(),
    );
    expect(code).toBe(0);
    expect((await readFile(join(dir, "out", "pic.png"))).equals(PNG_BYTES)).toBe(true);
  });

  it("prints fidelity warnings", async () => {
    await writeFile(join(dir, "in.json"), INLINE_IMAGE_JSON);
    const output = capture();
    const code = await runCli(
      ["--input-file", join(dir, "in.json"), "--output-file", join(dir, "out.txt"), "--output-format", "txt"],
      output,
    );
    expect(code).toBe(0);
    expect(output.err).toEqual(["warning: Image: plain text cannot hold images"]);
  });

  it("fails on a missing input file", async () => {
    const output = capture();
    const missing = join(dir, "missing.md");
    const code = await runCli(
      ["--input-file", missing, "--output-file", join(dir, "out.txt"), "--output-format", "txt"],
      output,
    );
    expect(code).toBe(1);
    expect(output.err).toEqual([`IOFailure: Failed to read ${missing}`]);
  });

  it("fails on an unknown output format", async () => {
    await writeFile(join(dir, "in.txt"), "x\n");
    const output = capture();
    const code = await runCli(
      ["--input-file", join(dir, "in.txt"), "--output-file", join(dir, "out"), "--output-format", "docz"],
      output,
    );
    expect(code).toBe(1);
    expect(output.err).toEqual(["UnknownFormat: Unknown format: docz"]);
  });

  it("fails when the input format cannot be detected", async () => {
    const input = join(dir, "mystery");
    await writeFile(input, "plain words");
    const output = capture();
    const code = await runCli(
      ["--input-file", input, "--output-file", join(dir, "out.txt"), "--output-format", "txt"],
      output,
    );
    expect(code).toBe(1);
    expect(output.err).toEqual([`UnknownFormat: Cannot detect the format of ${input}`]);
  });

  it("fails on a missing image", async () => {
    await writeFile(join(dir, "in.md"), "![x](gone.png)\n");
    const output = capture();
    const code = await runCli(
      ["--input-file", join(dir, "in.md"), "--output-file", join(dir, "out.html"), "--output-format", "html"],
      output,
    );
    expect(code).toBe(1);
    expect(output.err).toEqual(["MissingImage: Missing image: gone.png"]);
  });

  it("exits non-zero when a required option is missing", async () => {
    const output = capture();
    const code = await runCli(["--input-file", "in.md"], output);
    expect(code).toBe(1);
    expect(output.err).toHaveLength(1);
    expect(output.out).toEqual([]);
  });
});
