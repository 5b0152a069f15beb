import { existsSync, readFileSync, writeFileSync } from "fs";
import { posix } from "path";
import { load, type Cheerio, type CheerioAPI } from "cheerio";
import type { AnyNode, Element } from "domhandler";
import { formatDisplayDate, parseDisplayDate } from "./date";
import { BlogError } from "./errors";
import { stem } from "./post";
import type { IndexEntry, Post, ReconcileResult, Reporter } from "./typings";

const ENTRY = "article.blog-post";
const HEADING = "h1, h2, h3, h4, h5, h6";

export interface ReconcilerOptions {
  /** path to index.html */
  indexFile: string;
  /** id of the section holding the entries, default: "blog" */
  sectionId?: string;
  /** default: console */
  reporter?: Reporter;
}

interface Located {
  $: CheerioAPI;
  section: Cheerio<Element>;
}

interface Found {
  node: Cheerio<Element>;
  entry: IndexEntry;
}

function text<T extends AnyNode>(node: Cheerio<T>) {
  return node.text().replace(/\s+/g, " ").trim();
}

/**
 * Newest first; posts with equal dates keep their relative order. Dates that
 * cannot be read go last, where {@link IndexReconciler.reconcileOne} puts them.
 */
export function sortPosts(posts: readonly Post[]): Post[] {
  return [...posts].sort((a, b) => {
    const x = parseDisplayDate(a.date);
    const y = parseDisplayDate(b.date);
    if (x === undefined || y === undefined) {
      return x === y ? 0 : x === undefined ? 1 : -1;
    }
    return x < y ? 1 : x > y ? -1 : 0;
  });
}

export function entryOf(post: Post): IndexEntry {
  return {
    title: post.title,
    href: post.url,
    date: formatDisplayDate(post.date),
    description: post.description,
    filename: post.htmlFilename,
    stem: stem(post.htmlFilename),
  };
}

/**
 * Keeps the blog section of index.html in sync with the posts.
 *
 * Each mutating call loads the document, locates the section, changes the
 * entries and writes the whole document back. When the index or the section
 * is missing a {@link BlogError} is thrown before anything is written.
 *
 * An entry looks like:
 *
 * ```html
 * <article class="blog-post">
 *   <h3><a href="blog/hello-world.html">Hello World</a></h3>
 *   <time>January 05, 2024</time>
 *   <p>Optional description</p>
 * </article>
 * ```
 */
export class IndexReconciler {
  readonly indexFile: string;
  readonly sectionId: string;
  private reporter: Reporter;

  constructor(options: ReconcilerOptions) {
    this.indexFile = options.indexFile;
    this.sectionId = options.sectionId ?? "blog";
    this.reporter = options.reporter ?? console;
  }

  private read(): Located | { error: BlogError } {
    if (!existsSync(this.indexFile)) {
      return { error: new BlogError("MISSING_INDEX", `${this.indexFile} not found`) };
    }
    const $ = load(readFileSync(this.indexFile, "utf-8"));
    const section = $("section")
      .filter((_, el) => $(el).attr("id") === this.sectionId)
      .first();
    if (!section.length) {
      return {
        error: new BlogError("MISSING_SECTION", `Section #${this.sectionId} not found in ${this.indexFile}`),
      };
    }
    return { $, section };
  }

  private locate(): Located {
    const located = this.read();
    if ("error" in located) throw located.error;
    return located;
  }

  private persist($: CheerioAPI) {
    writeFileSync(this.indexFile, $.html());
  }

  private find($: CheerioAPI, section: Cheerio<Element>): Found[] {
    const found: Found[] = [];
    for (const el of section.find(ENTRY).toArray()) {
      const node = $(el);
      const link = node.find("a").first();
      const href = link.attr("href");
      if (!href) continue;
      const filename = posix.basename(href.replace(/[?#].*$/, ""));
      found.push({
        node,
        entry: {
          title: text(link),
          href,
          date: text(node.find("time").first()),
          description: text(node.find("p").first()),
          filename,
          stem: stem(filename),
        },
      });
    }
    return found;
  }

  private create($: CheerioAPI, post: Post) {
    const entry = entryOf(post);
    const article = $("<article></article>").addClass("blog-post");
    const link = $("<a></a>").attr("href", entry.href).text(entry.title);
    article.append($("<h3></h3>").append(link));
    article.append($("<time></time>").text(entry.date));
    if (entry.description) {
      article.append($("<p></p>").text(entry.description));
    }
    return { article, entry };
  }

  /** Entries currently in the index, in document order. Missing index or section reads as empty. */
  listExistingEntries(): IndexEntry[] {
    const located = this.read();
    if ("error" in located) return [];
    return this.find(located.$, located.section).map((f) => f.entry);
  }

  /**
   * Replaces the entry linking to the same html file, or inserts a new entry
   * before the first entry with an earlier date. Stored dates that cannot be
   * parsed are skipped. When no entry is earlier, or the post's own date
   * cannot be parsed, the new one goes after the last entry; in an empty
   * section it goes right after the heading, or at the end without one.
   */
  reconcileOne(post: Post): ReconcileResult {
    const { $, section } = this.locate();
    const existing = this.find($, section).find((f) => f.entry.filename === post.htmlFilename);
    const { article, entry } = this.create($, post);

    if (existing) {
      existing.node.replaceWith(article);
      this.persist($);
      this.reporter.info(`Updated existing blog post: ${post.title}`);
      return { status: "updated", entry };
    }

    const date = parseDisplayDate(post.date);
    const articles = section.find(ENTRY).toArray().map((el) => $(el));
    const before =
      date === undefined
        ? undefined
        : articles.find((node) => {
            const other = parseDisplayDate(text(node.find("time").first()));
            return other !== undefined && other < date;
          });

    if (before) {
      before.before(article);
      before.before("\n");
    } else {
      const last = articles.length ? articles[articles.length - 1] : section.children(HEADING).first();
      if (last.length) {
        last.after(article);
        last.after("\n");
      } else {
        section.append(article);
      }
    }
    this.persist($);
    this.reporter.info(`Added new blog post: ${post.title}`);
    return { status: "inserted", entry };
  }

  /**
   * Drops everything in the section but its heading and appends one entry
   * per post, newest first. Running it twice with the same posts gives the
   * same section.
   */
  rebuildAll(posts: readonly Post[]): IndexEntry[] {
    const { $, section } = this.locate();
    const heading = section.children(HEADING).first();
    section.empty();
    if (heading.length) section.append(heading);

    const entries: IndexEntry[] = [];
    for (const post of sortPosts(posts)) {
      const { article, entry } = this.create($, post);
      section.append("\n");
      section.append(article);
      entries.push(entry);
    }
    section.append("\n");
    this.persist($);
    this.reporter.info(`Rebuilt blog section with ${entries.length} blog posts`);
    return entries;
  }
}
