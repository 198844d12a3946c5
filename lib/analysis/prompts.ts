import type { AnalysisContext, ContributionContext } from "@/types/analysis";

export const REPO_SYSTEM_PROMPT = `You help hiring managers understand GitHub projects quickly.
Analyze the repo and return JSON with:
{"description":"2-3 sentence summary explaining what this project does, its purpose, and key features","technologies":["list ALL frameworks, libraries, languages, databases, and tools used"]}

Be thorough detecting technologies from:
- File names: package.json/node_modules=Node.js, requirements.txt/venv=Python, pom.xml/gradle=Java, Gemfile=Ruby, go.mod=Go, Cargo.toml=Rust
- Config files: next.config=Next.js, vite.config=Vite, angular.json=Angular, vue.config=Vue, tailwind.config=Tailwind, tsconfig=TypeScript, .eslintrc=ESLint
- Folders: prisma/=Prisma, .github/workflows=GitHub Actions, docker-compose=Docker, terraform/=Terraform, k8s/=Kubernetes
- Dependencies listed in the config file or README
List specific versions/names when possible (e.g., "React 18", "PostgreSQL", "Redis").`;

export const CONTRIBUTION_SYSTEM_PROMPT = `You help hiring managers understand what a developer did in a GitHub repository.
Read the commits, pull requests and issues below and return JSON with:
{"relationship":"Owner | Core Contributor | Contributor | Occasional Contributor","primaryAreas":["areas of the codebase they worked on, e.g. Frontend, API, Documentation"],"summary":"2-3 sentences on what this person contributed","notableContributions":["up to 5 specific, concrete contributions"]}

Base everything on the evidence given. Do not invent work that is not listed.`;

function list(items: readonly string[], fallback: string) {
  return items.length ? items.join(", ") : fallback;
}

export function repoUserPrompt(ctx: AnalysisContext) {
  const lines = [
    `Repo: ${ctx.name}`,
    `Desc: ${ctx.description || "None"}`,
    `Topics: ${list(ctx.topics, "None")}`,
    `Langs: ${list(ctx.languages, "Unknown")}`,
    "Files:",
    ...ctx.files,
    "README:",
    ctx.readme || "None",
  ];

  if (ctx.configFile) {
    lines.push(`Config (${ctx.configFile}):`, ctx.configContent || "(empty)");
  }

  return lines.join("\n");
}

export function contributionUserPrompt(ctx: ContributionContext) {
  return [
    `Repo: ${ctx.repository}`,
    `User: ${ctx.username}`,
    `Commits: ${ctx.totalCommits} (+${ctx.totalAdditions} / -${ctx.totalDeletions})`,
    ...ctx.commitMessages.map((m) => `- ${m}`),
    `Pull requests: ${ctx.totalPullRequests} (${ctx.mergedPullRequests} merged)`,
    ...ctx.pullRequests.map(
      (p) => `- [${p.state}] ${p.title}${p.files.length ? ` (${p.files.join(", ")})` : ""}`
    ),
    `Issues: ${ctx.totalIssues}`,
    ...ctx.issues.map(
      (i) => `- [${i.state}] ${i.title}${i.labels.length ? ` {${i.labels.join(", ")}}` : ""}`
    ),
  ].join("\n");
}
