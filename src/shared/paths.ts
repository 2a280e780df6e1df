import { isAbsolute, relative, sep } from "path";

/** True when `path` is `folder` itself or lies beneath it (segment-aware). */
export function isWithin(path: string, folder: string): boolean {
  const rel = relative(folder, path);
  if (rel === "") return true;
  return rel !== ".." && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}
