import { promises as fs, type Stats } from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import { ExtractionError } from "@medrag/core";
import type { CollectionId, RawDocument } from "@medrag/core";
import { DEFAULT_IGNORE_DIRS, PAGE_SEPARATOR, TEXT_EXTENSIONS } from "./ignore.js";

function sha256(input: string): string {
  return crypto.createHash("sha256").update(input).digest("hex");
}

function isTextFile(filePath: string): boolean {
  return TEXT_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

async function walk(dir: string, out: string[]): Promise<void> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const ent of entries) {
    if (ent.isDirectory()) {
      if (DEFAULT_IGNORE_DIRS.has(ent.name)) continue;
      await walk(path.join(dir, ent.name), out);
    } else if (ent.isFile() && isTextFile(ent.name)) {
      out.push(path.join(dir, ent.name));
    }
  }
}

export function splitPages(content: string): string[] {
  return content.split(PAGE_SEPARATOR);
}

async function readPages(absPath: string): Promise<string[]> {
  let content: string;
  try {
    content = await fs.readFile(absPath, "utf8");
  } catch (err) {
    throw new ExtractionError(absPath, "io", "file is not readable", err);
  }
  if (content.includes("\u0000")) {
    throw new ExtractionError(absPath, "format", "file looks binary; extract its text first");
  }
  return splitPages(content);
}

/**
 * Loads pre-extracted page text from a `.txt` file, or from every `.txt` file
 * under a directory (sorted by relative path).
 */
export async function loadTextDocuments(params: {
  sourcePath: string;
  collection: CollectionId;
}): Promise<RawDocument[]> {
  const sourcePath = path.resolve(params.sourcePath);

  let stat: Stats;
  try {
    stat = await fs.stat(sourcePath);
  } catch (err) {
    throw new ExtractionError(sourcePath, "io", "path does not exist", err);
  }

  const root = stat.isDirectory() ? sourcePath : path.dirname(sourcePath);
  const files: string[] = [];
  if (stat.isDirectory()) {
    await walk(sourcePath, files);
  } else if (isTextFile(sourcePath)) {
    files.push(sourcePath);
  }

  if (files.length === 0) {
    throw new ExtractionError(sourcePath, "format", "no .txt page files found");
  }

  const entries = files
    .map((absPath) => ({ absPath, relPath: path.relative(root, absPath).replaceAll("\\", "/") }))
    .sort((a, b) => (a.relPath < b.relPath ? -1 : a.relPath > b.relPath ? 1 : 0));

  const docs: RawDocument[] = [];
  for (const { absPath, relPath } of entries) {
    const pages = await readPages(absPath);

    // doc id stable: collection + relPath
    const id = sha256(`${params.collection}:${relPath}`);

    docs.push({ id, collection: params.collection, path: relPath, pages });
  }

  return docs;
}
