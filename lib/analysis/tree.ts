import type { DirectoryEntry } from "@/types/github";

/** Flatten a directory listing to root-relative paths: `src/`, `src/main.ts`. Depth-first, input order kept. */
export function flattenTree(
  entries: readonly DirectoryEntry[] | null | undefined,
  prefix = ""
): string[] {
  const paths: string[] = [];
  if (!entries) return paths;

  for (const entry of entries) {
    const path = `${prefix}${entry.name}`;
    if (entry.type === "directory") {
      paths.push(`${path}/`);
      paths.push(...flattenTree(entry.children, `${path}/`));
    } else {
      paths.push(path);
    }
  }
  return paths;
}
