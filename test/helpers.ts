import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { fileURLToPath } from "url";
import type { Post, Reporter } from "../src";

const FIXTURE = fileURLToPath(new URL("./fixtures/index.html", import.meta.url));

const roots: string[] = [];

/** A fresh directory under the os tmpdir, removed by {@link cleanup}. */
export function tempRoot(): string {
  const root = mkdtempSync(join(tmpdir(), "blogsync-test-"));
  roots.push(root);
  return root;
}

export function cleanup() {
  for (const root of roots.splice(0)) {
    rmSync(root, { recursive: true, force: true });
  }
}

/** Fixture index.html with `entries` placed after the blog heading. */
export function indexHtml(entries = ""): string {
  const html = readFileSync(FIXTURE, "utf-8");
  return html.replace("<h2>Blog</h2>\n", `<h2>Blog</h2>\n${entries}`);
}

export function article(name: string, title: string, date: string, description?: string): string {
  const p = description === undefined ? "" : `<p>${description}</p>`;
  return `        <article class="blog-post"><h3><a href="blog/${name}.html">${title}</a></h3><time>${date}</time>${p}</article>\n`;
}

export function writeIndex(root: string, entries = ""): string {
  const file = join(root, "index.html");
  writeFileSync(file, indexHtml(entries));
  return file;
}

export function makePost(name: string, date: string, overrides: Partial<Post> = {}): Post {
  return {
    title: name,
    date,
    description: "",
    body: `<p>${name}</p>`,
    filename: `${name}.md`,
    htmlFilename: `${name}.html`,
    url: `blog/${name}.html`,
    ...overrides,
  };
}

export interface MemoryReporter extends Reporter {
  infos: string[];
  warnings: string[];
  errors: string[];
}

export function memoryReporter(): MemoryReporter {
  const infos: string[] = [];
  const warnings: string[] = [];
  const errors: string[] = [];
  return {
    infos,
    warnings,
    errors,
    info: (message) => infos.push(message),
    warn: (message) => warnings.push(message),
    error: (message) => errors.push(message),
  };
}

/** Deterministic random numbers in [0, 1). */
export function seeded(seed: number): () => number {
  let a = seed;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
