import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { collectDefinitionFiles } from "../src/infrastructure/definitionFiles.js";
import { IoError } from "../src/domain/errors.js";

describe("collectDefinitionFiles", () => {
  let dir: string;
  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "gctf-files-"));
    for (const rel of ["b.gctf", "a/x.gctf", "a/notes.txt", ".cache/y.gctf", "node_modules/pkg/z.gctf"]) {
      fs.mkdirSync(path.dirname(path.join(dir, rel)), { recursive: true });
      fs.writeFileSync(path.join(dir, rel), "");
    }
  });
  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("walks directories in name order", async () => {
    expect(await collectDefinitionFiles([dir])).toEqual([path.join(dir, "a", "x.gctf"), path.join(dir, "b.gctf")]);
  });

  it("keeps explicit files once", async () => {
    const explicit = path.join(dir, "b.gctf");
    expect(await collectDefinitionFiles([explicit, dir])).toEqual([explicit, path.join(dir, "a", "x.gctf")]);
  });

  it("fails on a missing input", async () => {
    await expect(collectDefinitionFiles([path.join(dir, "nope")])).rejects.toBeInstanceOf(IoError);
  });
});
