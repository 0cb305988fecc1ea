import { chmod, stat, utimes } from "node:fs/promises";

/** Copy permission bits and access/modification times from `source`. */
export async function copyMetadata(source: string, target: string): Promise<void> {
  const st = await stat(source);
  await chmod(target, st.mode & 0o7777);
  await utimes(target, st.atime, st.mtime);
}
