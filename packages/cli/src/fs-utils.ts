import path from "node:path";

export function toDisplayPath(target: string, base: string = process.cwd()): string {
  const relative = path.relative(base, target);
  if (!relative || relative.startsWith("..") || path.isAbsolute(relative)) {
    return target;
  }
  return relative.split(path.sep).join("/");
}
