import { readFileSync } from "fs";
import { basename, extname } from "path";
import { TextDecoder } from "util";
import { load } from "js-yaml";
import { isoDate } from "./date";
import { BlogError } from "./errors";
import { createMarkdownParser } from "./marked";
import type { Post } from "./typings";

export const OUTPUT_DIR = "blog";

const utf8 = new TextDecoder("utf-8", { fatal: true });

function matter(text: string): [unknown, string] {
  const m = /^---\r?\n(?:---|([\s\S]*?)\r?\n---)[ \t]*(?:\r?\n|$)/.exec(text);
  if (!m) return [null, text];
  return [m[1] === undefined ? null : load(m[1]), text.slice(m[0].length)];
}

function titleFromFilename(filename: string) {
  return stem(filename)
    .replace(/-/g, " ")
    .replace(/[A-Za-z0-9]+/g, (w) => w.charAt(0).toUpperCase() + w.slice(1).toLowerCase());
}

function field(value: unknown): string | undefined {
  if (value === undefined || value === null) return;
  if (value instanceof Date) return value.toISOString().slice(0, 10);
  return String(value);
}

/** Filename without its extension: `hello-world.md` -> `hello-world`. */
export function stem(filename: string) {
  const name = basename(filename);
  return name.slice(0, name.length - extname(name).length);
}

/** `hello-world.md` -> `hello-world.html`. */
export function htmlFilenameOf(filename: string) {
  return `${stem(filename)}.html`;
}

export interface ParseOptions {
  /** default: () => new Date() */
  now?: () => Date;
  /** default: a fresh converter from createMarkdownParser() */
  markdown?: (markdown: string) => string;
}

export function parseMarkdown(filename: string, raw: string, options: ParseOptions = {}): Post {
  const [frontmatter, text] = matter(raw);

  let meta: Record<string, unknown> = {};
  if (frontmatter !== null && frontmatter !== undefined) {
    if (typeof frontmatter !== "object" || Array.isArray(frontmatter)) {
      throw new BlogError("INVALID_FRONTMATTER", `Frontmatter of ${filename} must be a mapping`);
    }
    meta = { ...frontmatter };
  }

  const now = options.now ?? (() => new Date());
  const markdown = options.markdown ?? createMarkdownParser();
  const htmlFilename = htmlFilenameOf(filename);

  return {
    title: field(meta.title) || titleFromFilename(filename),
    date: field(meta.date) || isoDate(now()),
    description: field(meta.description) ?? "",
    body: markdown(text),
    filename: basename(filename),
    htmlFilename,
    url: `${OUTPUT_DIR}/${htmlFilename}`,
  };
}

/** Reads `path` as strict UTF-8; undecodable bytes throw instead of becoming U+FFFD. */
export function readPost(path: string, options?: ParseOptions): Post {
  const bytes = readFileSync(path);
  let raw: string;
  try {
    raw = utf8.decode(bytes);
  } catch {
    throw new BlogError("INVALID_ENCODING", `${path} is not valid UTF-8`);
  }
  return parseMarkdown(basename(path), raw, options);
}
