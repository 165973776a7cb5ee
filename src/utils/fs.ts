import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

export function ensureDir(dirPath: string): void {
  fs.mkdirSync(dirPath, { recursive: true });
}

export function projectRootDir(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  let cur = here;
  for (let i = 0; i < 8; i++) {
    if (fs.existsSync(path.join(cur, "package.json"))) return cur;
    const next = path.dirname(cur);
    if (next === cur) break;
    cur = next;
  }
  return path.resolve(here, "../..");
}

/** Writes through a temp file and a rename so readers never see a half-written file. */
export function atomicWriteJson(filePath: string, data: unknown): void {
  ensureDir(path.dirname(filePath));
  const tmp = `${filePath}.${process.pid}.${Date.now()}.tmp`;
  fs.writeFileSync(tmp, JSON.stringify(data, null, 2), "utf8");
  fs.renameSync(tmp, filePath);
}

/** Parsed JSON, or undefined when the file is missing. Throws on malformed JSON. */
export function readJsonFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) return undefined;
  return JSON.parse(fs.readFileSync(filePath, "utf8"));
}
