import * as fs from "node:fs/promises";
import * as path from "node:path";

/** Read a JSON file and parse it; validate the result with a schema */
export async function readJSON(filePath: string): Promise<unknown> {
  const content = await fs.readFile(filePath, "utf-8");
  return JSON.parse(content);
}

/** Write an object as JSON to a file */
export async function writeJSON(
  filePath: string,
  data: unknown
): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(data, null, 2), "utf-8");
}

/** Frame file names inside the work dir; chunk frames are numbered from 00 */
export function frameNames(chunkIndex: number) {
  return {
    cover: "cover.png",
    chunk: `${String(chunkIndex).padStart(2, "0")}.png`,
    ending: "ending.png",
  };
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}

/** Whether `p` exists and is a directory */
export async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch (err) {
    if (isMissing(err)) return false;
    throw err;
  }
}

/** Whether `p` exists and is a regular file */
export async function isFile(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isFile();
  } catch (err) {
    if (isMissing(err)) return false;
    throw err;
  }
}
