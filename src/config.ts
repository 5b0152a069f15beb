import { existsSync, readFileSync } from "fs";
import { load } from "js-yaml";
import { BlogError } from "./errors";
import type { SiteConfig, SiteLink } from "./typings";

export const CONFIG_FILE = "site.yml";

function scalar(data: Record<string, unknown>, key: string, fallback: string): string {
  const value = data[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "string" && typeof value !== "number") {
    throw new BlogError("INVALID_CONFIG", `'${key}' in ${CONFIG_FILE} must be a string`);
  }
  return String(value);
}

function links(value: unknown): SiteLink[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new BlogError("INVALID_CONFIG", `'links' in ${CONFIG_FILE} must be a list`);
  }
  return value.map((item: unknown, i) => {
    if (typeof item !== "object" || item === null || Array.isArray(item)) {
      throw new BlogError("INVALID_CONFIG", `'links[${i}]' in ${CONFIG_FILE} must have a label and an href`);
    }
    const { label, href }: Record<string, unknown> = { ...item };
    if (typeof label !== "string" || typeof href !== "string") {
      throw new BlogError("INVALID_CONFIG", `'links[${i}]' in ${CONFIG_FILE} must have a label and an href`);
    }
    return { label, href };
  });
}

export function resolveSiteConfig(data: unknown, year = new Date().getFullYear()): SiteConfig {
  if (data === undefined || data === null) data = {};
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new BlogError("INVALID_CONFIG", `${CONFIG_FILE} must be a mapping`);
  }
  const record: Record<string, unknown> = { ...data };
  const name = scalar(record, "name", "Blog");
  return {
    name,
    tagline: scalar(record, "tagline", ""),
    footer: scalar(record, "footer", `© ${year} ${name}.`),
    links: links(record.links),
    sectionId: scalar(record, "sectionId", "blog"),
  };
}

/** Reads `site.yml` from `path`, missing file means defaults. */
export function loadSiteConfig(path: string, year?: number): SiteConfig {
  const data = existsSync(path) ? load(readFileSync(path, "utf-8")) : undefined;
  return resolveSiteConfig(data, year);
}
