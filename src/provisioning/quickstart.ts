// src/provisioning/quickstart.ts
// ============================================================================
// Quickstart: re-brand the project from a handful of inputs
// ----------------------------------------------------------------------------
// planQuickstart() is pure: current file contents in, full new contents out.
// Every field is derived from the input alone, so a second run with the same
// input yields the same bytes and a run with new input replaces the old
// values (no string search for the previous project name).
//
// applyWrites() stages all files first and renames them into place only
// when every temp file was written.
// ============================================================================

import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { parseDocument } from "yaml";
import { z } from "zod";
import { ColorSchema, colorClasses, type Branding, type NavItem } from "../client/branding.js";
import { tokenStorageKeys } from "../client/token-store.js";
import { toKebabCase, toSnakeCase, toTitleCase } from "../libs/case.js";

export const QUICKSTART_FILES = {
  appConfig: "config/app.yaml",
  branding: "web/branding.json",
  compose: "docker-compose.yml",
  savedConfig: "quickstart.config.json",
} as const;

export const PAGE_ICONS: Readonly<Record<string, string>> = {
  dashboard: "home",
  settings: "cog",
  projects: "folder",
  analytics: "chart-bar",
  users: "users",
  reports: "document",
  integrations: "puzzle",
  billing: "credit-card",
};

const DEFAULT_ICON = "circle";

export const QuickstartConfigSchema = z.object({
  projectName: z.string().trim().min(1).max(64),
  description: z.string().trim().max(200).default("Enterprise Multi-Platform Architecture"),
  primaryColor: ColorSchema.default("blue"),
  pages: z.array(z.string().trim().min(1)).min(1).default(["dashboard", "settings"]),
});

export type QuickstartConfig = z.infer<typeof QuickstartConfigSchema>;

/** "dashboard, settings,,projects" -> ["dashboard", "settings", "projects"] */
export function parsePageList(value: string): string[] {
  return value
    .split(",")
    .map((page) => page.trim())
    .filter(Boolean);
}

export type PageSpec = {
  name: string;
  path: string;
  icon: string;
  description: string;
};

export function pageSpec(raw: string): PageSpec {
  const name = toTitleCase(raw);
  return {
    name,
    path: toKebabCase(raw),
    icon: PAGE_ICONS[raw.toLowerCase()] ?? DEFAULT_ICON,
    description: `${name} page`,
  };
}

export type FileWrite = {
  /** Relative to the project root, forward slashes. */
  path: string;
  content: string;
};

/** Current contents keyed by relative path; undefined when the file is missing. */
export type CurrentFiles = Readonly<Record<string, string | undefined>>;

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function toJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

function uniquePages(config: QuickstartConfig): PageSpec[] {
  const seen = new Set<string>();
  const pages: PageSpec[] = [];
  for (const raw of config.pages) {
    const page = pageSpec(raw);
    if (seen.has(page.path)) continue;
    seen.add(page.path);
    pages.push(page);
  }
  return pages;
}

function planAppConfig(config: QuickstartConfig, current: string | undefined): string {
  const lower = config.projectName.toLowerCase();
  const bucketBase = toKebabCase(lower);
  const doc = parseDocument(current ?? "");
  if (doc.errors.length > 0) {
    throw new Error(`${QUICKSTART_FILES.appConfig}: ${doc.errors[0]?.message ?? "invalid YAML"}`);
  }
  doc.setIn(["app", "name"], config.projectName);
  doc.setIn(["app", "description"], config.description);
  doc.setIn(["storage", "uploadsBucket"], `${bucketBase}-uploads`);
  doc.setIn(["storage", "exportsBucket"], `${bucketBase}-exports`);
  doc.setIn(["secrets", "prefix"], bucketBase);
  return doc.toString();
}

function planCompose(config: QuickstartConfig, current: string): string {
  const dbName = toSnakeCase(config.projectName);
  const doc = parseDocument(current);
  if (doc.errors.length > 0) {
    throw new Error(`${QUICKSTART_FILES.compose}: ${doc.errors[0]?.message ?? "invalid YAML"}`);
  }

  if (doc.hasIn(["services", "postgres"])) {
    doc.setIn(["services", "postgres", "environment", "POSTGRES_DB"], dbName);
  }

  // Keep the API pointed at the renamed database.
  const apiUrlPath = ["services", "api", "environment", "DATABASE_URL"];
  const apiUrl = doc.getIn(apiUrlPath);
  if (typeof apiUrl === "string" && URL.canParse(apiUrl)) {
    const url = new URL(apiUrl);
    url.pathname = `/${dbName}`;
    doc.setIn(apiUrlPath, url.toString());
  }

  return doc.toString();
}

function planBranding(config: QuickstartConfig, pages: PageSpec[]): Branding {
  const navigation: NavItem[] = pages.map((page) => ({
    name: page.name,
    href: `/${page.path}`,
    icon: page.icon,
  }));
  return {
    name: config.projectName,
    description: config.description,
    primaryColor: config.primaryColor,
    colorClasses: colorClasses(config.primaryColor),
    tokenStorage: tokenStorageKeys(config.projectName),
    navigation,
  };
}

function pageHtml(config: QuickstartConfig, page: PageSpec): string {
  const title = escapeHtml(page.name);
  return [
    "<!doctype html>",
    '<html lang="en">',
    "<head>",
    '  <meta charset="utf-8" />',
    `  <title>${title} | ${escapeHtml(config.projectName)}</title>`,
    "</head>",
    "<body>",
    `  <main data-page="${escapeHtml(page.path)}" data-icon="${escapeHtml(page.icon)}">`,
    `    <h1>${title}</h1>`,
    `    <p>${escapeHtml(page.description)}</p>`,
    "  </main>",
    "</body>",
    "</html>",
    "",
  ].join("\n");
}

export function planQuickstart(config: QuickstartConfig, currentFiles: CurrentFiles): FileWrite[] {
  const pages = uniquePages(config);
  const writes: FileWrite[] = [
    {
      path: QUICKSTART_FILES.appConfig,
      content: planAppConfig(config, currentFiles[QUICKSTART_FILES.appConfig]),
    },
    { path: QUICKSTART_FILES.branding, content: toJson(planBranding(config, pages)) },
  ];

  const compose = currentFiles[QUICKSTART_FILES.compose];
  if (compose !== undefined) {
    writes.push({ path: QUICKSTART_FILES.compose, content: planCompose(config, compose) });
  }

  writes.push({ path: QUICKSTART_FILES.savedConfig, content: toJson(config) });

  for (const page of pages) {
    if (page.path === "dashboard") continue;
    writes.push({ path: `web/pages/${page.path}.html`, content: pageHtml(config, page) });
  }

  return writes;
}

function resolveInside(root: string, relative: string): string {
  const base = path.resolve(root);
  const target = path.resolve(base, relative);
  if (target !== base && !target.startsWith(`${base}${path.sep}`)) {
    throw new Error(`Refusing to write outside the project: ${relative}`);
  }
  return target;
}

/**
 * Writes every file as `<file>.<pid>.tmp`, then renames them into place.
 * If staging fails the temp files are removed and no target is touched.
 */
export async function applyWrites(root: string, writes: FileWrite[]): Promise<string[]> {
  const staged: { tmp: string; target: string }[] = [];

  try {
    for (const write of writes) {
      const target = resolveInside(root, write.path);
      const tmp = `${target}.${process.pid}.tmp`;
      await mkdir(path.dirname(target), { recursive: true });
      staged.push({ tmp, target });
      await writeFile(tmp, write.content, "utf8");
    }
  } catch (err) {
    await Promise.all(staged.map(({ tmp }) => rm(tmp, { force: true })));
    throw err;
  }

  for (const { tmp, target } of staged) {
    await rename(tmp, target);
  }
  return staged.map(({ target }) => target);
}
