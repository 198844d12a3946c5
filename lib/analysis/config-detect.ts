// Highest priority first.
export const CONFIG_FILES = [
  "package.json", // Node.js
  "pom.xml", // Java Maven
  "build.gradle", // Java Gradle
  "pyproject.toml", // Python (modern)
  "requirements.txt", // Python (classic)
  "go.mod",
  "Cargo.toml",
  "composer.json", // PHP
  "Gemfile", // Ruby
  "setup.py", // Python (old)
] as const;

/**
 * Pick the manifest to show the model. Matching is exact, so only root-level
 * files qualify: nested paths carry their directory prefix.
 */
export function detectConfigFile(
  paths: readonly string[],
  candidates: readonly string[] = CONFIG_FILES
): string | null {
  const present = new Set(paths);
  for (const candidate of candidates) {
    if (present.has(candidate)) return candidate;
  }
  return null;
}
