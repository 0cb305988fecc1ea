import { isAbsolute, relative, resolve, sep } from "node:path";

/** Directories whose contents pcopy never writes itself; copies there go to `/bin/cp`. */
export const SYSTEM_DIRECTORIES: readonly string[] = Object.freeze([
  "/bin",
  "/boot",
  "/etc",
  "/lib",
  "/lib64",
  "/sbin",
  "/sys",
  "/usr",
  "/proc",
  "/dev",
]);

/** True when `child` is `parent` itself or lies somewhere below it. */
export function isPathWithin(parent: string, child: string): boolean {
  const rel = relative(resolve(parent), resolve(child));
  if (rel === "") return true;
  if (isAbsolute(rel)) return false;
  return rel !== ".." && !rel.startsWith(`..${sep}`);
}

export function isSystemDirectory(path: string): boolean {
  return SYSTEM_DIRECTORIES.some((dir) => isPathWithin(dir, path));
}
