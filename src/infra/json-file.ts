import fs from "node:fs";
import path from "node:path";

/** Read and parse a JSON file. Missing or unparsable files yield `undefined`. */
export function loadJsonFile(pathname: string): unknown {
  if (!fs.existsSync(pathname)) {
    return undefined;
  }
  const raw = fs.readFileSync(pathname, "utf8");
  try {
    return JSON.parse(raw) as unknown;
  } catch (e) {
    console.warn(`[json-file] Ignoring unparsable ${pathname}:`, e);
    return undefined;
  }
}

export function saveJsonFile(pathname: string, data: unknown): void {
  const dir = path.dirname(pathname);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
  // Write beside the target, then rename over it
  const tmp = `${pathname}.tmp.${process.pid}`;
  fs.writeFileSync(tmp, `${JSON.stringify(data, null, 2)}\n`, { encoding: "utf8", mode: 0o600 });
  fs.renameSync(tmp, pathname);
}
