import fs from "fs/promises";
import path from "path";
import { DEFINITION_EXTENSION } from "../domain/constants.js";
import { IoError, errorMessage } from "../domain/errors.js";

async function walk(dir: string, out: string[]): Promise<void> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (entry.name === "node_modules" || entry.name.startsWith(".")) continue;
      await walk(full, out);
    } else if (entry.isFile() && entry.name.endsWith(DEFINITION_EXTENSION)) {
      out.push(full);
    }
  }
}

/**
 * Expands files and directories into `.gctf` paths. Directories are walked
 * recursively in name order; explicit files are kept whatever their extension.
 */
export async function collectDefinitionFiles(inputs: readonly string[]): Promise<string[]> {
  const files: string[] = [];
  for (const input of inputs) {
    const stat = await fs.stat(input).catch((e: unknown) => {
      throw new IoError(`cannot access: ${errorMessage(e)}`, input, { cause: e });
    });
    if (stat.isDirectory()) {
      const found: string[] = [];
      await walk(input, found);
      files.push(...found);
    } else {
      files.push(input);
    }
  }
  return [...new Set(files)];
}
