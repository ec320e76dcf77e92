import { join } from "path";
import { writeFile } from "fs/promises";

const MAX_NAME_ATTEMPTS = 100;

/**
 * Write data to a new file in dir without ever replacing an existing one.
 * nameFor(1) is tried first; on EEXIST, nameFor(2), nameFor(3), ... Returns the name used.
 */
export async function writeNewFile(
  dir: string,
  nameFor: (attempt: number) => string,
  data: string | Uint8Array,
): Promise<string> {
  for (let attempt = 1; attempt <= MAX_NAME_ATTEMPTS; attempt++) {
    const name = nameFor(attempt);
    try {
      await writeFile(join(dir, name), data, { flag: "wx" });
      return name;
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "EEXIST") continue;
      throw err;
    }
  }
  throw new Error(`No free filename in ${dir} after ${MAX_NAME_ATTEMPTS} attempts`);
}
