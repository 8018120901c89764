// src/scripts/quickstart.ts
// ============================================================================
// Re-brand the project.
//
//   npm run quickstart -- --name "Acme Portal" --color indigo --pages dashboard,projects,billing
//   npm run quickstart -- --from-file quickstart.config.json
//
// Options: --name, --description, --color, --pages, --from-file, --root (default: cwd)
// ============================================================================

import { readFile } from "node:fs/promises";
import path from "node:path";
import { parseArgs } from "node:util";
import { createChildLogger } from "../libs/logger.js";
import {
  QUICKSTART_FILES,
  QuickstartConfigSchema,
  applyWrites,
  parsePageList,
  planQuickstart,
  type QuickstartConfig,
} from "../provisioning/quickstart.js";

const log = createChildLogger({ script: "quickstart" });

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function readIfExists(file: string): Promise<string | undefined> {
  try {
    return await readFile(file, "utf8");
  } catch (err) {
    if (isMissingFile(err)) return undefined;
    throw err;
  }
}

async function loadConfig(values: {
  name?: string;
  description?: string;
  color?: string;
  pages?: string;
  "from-file"?: string;
}): Promise<QuickstartConfig> {
  if (values["from-file"]) {
    const raw: unknown = JSON.parse(await readFile(values["from-file"], "utf8"));
    return QuickstartConfigSchema.parse(raw);
  }

  const parsed = QuickstartConfigSchema.safeParse({
    projectName: values.name,
    description: values.description,
    primaryColor: values.color,
    pages: values.pages === undefined ? undefined : parsePageList(values.pages),
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid quickstart input: ${issues.join("; ")}`);
  }
  return parsed.data;
}

async function main() {
  const { values } = parseArgs({
    options: {
      name: { type: "string" },
      description: { type: "string" },
      color: { type: "string" },
      pages: { type: "string" },
      "from-file": { type: "string" },
      root: { type: "string", default: "." },
    },
    strict: true,
  });

  const config = await loadConfig(values);
  const root = path.resolve(values.root ?? ".");

  const current: Record<string, string | undefined> = {};
  for (const file of [QUICKSTART_FILES.appConfig, QUICKSTART_FILES.compose]) {
    current[file] = await readIfExists(path.join(root, file));
  }
  const writes = planQuickstart(config, current);
  const written = await applyWrites(root, writes);

  log.info(
    { project: config.projectName, color: config.primaryColor, files: written.length },
    "quickstart applied",
  );
  for (const file of written) {
    log.info({ file: path.relative(root, file) }, "written");
  }
}

main().catch((err) => {
  log.error({ err }, "quickstart failed");
  process.exit(1);
});
