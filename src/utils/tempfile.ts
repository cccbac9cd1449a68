import { randomUUID } from "crypto";
import { writeFile } from "fs/promises";
import path from "path";

/**
 * Writes `contents` to a new file under `dir` and returns its path. The
 * `wx` flag makes creation exclusive, so a name clash fails instead of
 * overwriting another staged file.
 */
export async function writeTempFile(
  dir: string,
  contents: string,
  prefix: string = "event-",
): Promise<string> {
  const filePath = path.join(dir, `${prefix}${randomUUID()}.json`);
  await writeFile(filePath, contents, { encoding: "utf-8", flag: "wx" });
  return filePath;
}
