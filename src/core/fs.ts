import { mkdir, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

/** Creates the parent directory, then writes via a temp file and rename. */
export async function writeFileEnsured(path: string, data: string | Uint8Array): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.tmp`;
  await writeFile(tmp, data);
  await rename(tmp, path);
}
