import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { formatDisplayDate } from "./date";
import type { Post, SiteConfig } from "./typings";

type Part = { raw: string } | { expr: string };

interface Tag {
  head: string;
  tail: string;
  raw?: string;
  expr?: string;
}

function nextMustacheTag(template: string): Tag | undefined {
  const i = template.indexOf("{");
  // { expr } -> eval(expr)
  // {{ expr }} -> '{ expr }'
  if (i === -1) return;
  if (template[i + 1] === "{") {
    const j = template.indexOf("}}", i + 2);
    if (j !== -1) {
      return { head: template.slice(0, i), tail: template.slice(j + 2), raw: template.slice(i + 1, j + 1) };
    }
  }
  const j = template.indexOf("}", i + 1);
  if (j !== -1) {
    return { head: template.slice(0, i), tail: template.slice(j + 1), expr: template.slice(i + 1, j) };
  }
}

function parse(template: string): Part[] {
  const parts: Part[] = [];
  let indentSize = 4;
  const pushRaw = (raw: string) => {
    const l = /^ */.exec(raw)?.[0].length;
    if (l) indentSize = Math.min(indentSize, l);
    parts.push({ raw });
  };
  while (true) {
    const tag = nextMustacheTag(template);
    if (tag === undefined) {
      pushRaw(template);
      break;
    }
    pushRaw(tag.head);
    if (tag.raw) pushRaw(tag.raw);
    if (tag.expr) parts.push({ expr: tag.expr });
    template = tag.tail;
  }
  // blocks {#if}...{/if} do not add their own newline and indent to the output
  let depth = 0;
  return parts.map((part, index) => {
    if ("expr" in part) {
      if (part.expr[0] === "#") depth++;
      if (part.expr[0] === "/") depth--;
      return part;
    }
    if (!depth) return part;
    const raw = part.raw.trimStart().replace(new RegExp(`^ {${depth * indentSize}}`, "gm"), "");
    const next = parts[index + 1];
    return { raw: next && "expr" in next && next.expr[0] === "#" ? raw.trimEnd() : raw };
  });
}

/**
 * Compiles a template into a render function. `argument` is the parameter
 * list of that function, e.g. `"{ site, post }"`.
 *
 * - `{ expr }` outputs `expr` as is, escape values before rendering
 * - `{#each list as x}...{/each}`, `{#if cond}...{#else if cond}...{/if}`
 * - `{@const x = 1}` runs a statement
 * - `{{ text }}` outputs `{ text }`
 */
export function compile<T>(template: string, argument: string): (data: T) => string {
  let code = `let html = '';`;
  for (const p of parse(template)) {
    if ("raw" in p) {
      if (p.raw) code += `html += ${JSON.stringify(p.raw)};`;
    } else if (p.expr.startsWith("#each")) {
      const [list, x] = p.expr.slice(5).trim().split(" as ");
      code += `for (const ${x} of ${list}) {`;
    } else if (p.expr.startsWith("#if")) {
      code += `if (${p.expr.slice(3).trim()}) {`;
    } else if (p.expr.startsWith("#else if")) {
      code += `} else if (${p.expr.slice(8).trim()}) {`;
    } else if (p.expr.startsWith("/")) {
      code += "}";
    } else if (p.expr.startsWith("@")) {
      code += `${p.expr.slice(1).trim()};`;
    } else {
      code += `html += ${p.expr.trim()};`;
    }
  }
  code += `return html;`;
  const render = new Function(argument, code);
  return (data) => String(render(data));
}

export function escapeHtml(text: string) {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export interface PostView {
  site: {
    name: string;
    tagline: string;
    footer: string;
    sectionId: string;
    links: { label: string; href: string }[];
  };
  post: {
    title: string;
    date: string;
    displayDate: string;
    description: string;
    body: string;
  };
}

export const DEFAULT_POST_TEMPLATE = fileURLToPath(new URL("../templates/post.html", import.meta.url));

export function loadPostTemplate(path = DEFAULT_POST_TEMPLATE) {
  return compile<PostView>(readFileSync(path, "utf-8"), "{ site, post }");
}

/** Renders the standalone page of a post. Everything but the rendered body is escaped. */
export function renderPost(post: Post, site: SiteConfig, template = loadPostTemplate()): string {
  return template({
    site: {
      name: escapeHtml(site.name),
      tagline: escapeHtml(site.tagline),
      footer: escapeHtml(site.footer),
      sectionId: escapeHtml(site.sectionId),
      links: site.links.map((link) => ({ label: escapeHtml(link.label), href: escapeHtml(link.href) })),
    },
    post: {
      title: escapeHtml(post.title),
      date: escapeHtml(post.date),
      displayDate: escapeHtml(formatDisplayDate(post.date)),
      description: escapeHtml(post.description),
      body: post.body,
    },
  });
}
