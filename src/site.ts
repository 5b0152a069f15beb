import { existsSync, mkdirSync, readdirSync, readFileSync, writeFileSync } from "fs";
import { isAbsolute, join, resolve } from "path";
import { fileURLToPath } from "url";
import { CONFIG_FILE, loadSiteConfig } from "./config";
import { isoDate } from "./date";
import { BlogError, errorMessage } from "./errors";
import { createMarkdownParser } from "./marked";
import { OUTPUT_DIR, readPost } from "./post";
import { IndexReconciler } from "./reconcile";
import { compile, loadPostTemplate, renderPost, type PostView } from "./template";
import type { BuildOptions, Post, ReconcileResult, Reporter, SiteConfig } from "./typings";

export type SiteOptions = BuildOptions;

export const POSTS_DIR = "posts";
export const INDEX_FILE = "index.html";

const NEW_POST_TEMPLATE = fileURLToPath(new URL("../templates/new-post.md", import.meta.url));

export interface Failure {
  file: string;
  error: unknown;
}

/**
 * One blog on disk:
 *
 * ```
 * {cwd}/posts/*.md        sources
 * {cwd}/blog/*.html       rendered posts
 * {cwd}/index.html        home page with a <section id="blog">
 * {cwd}/site.yml          optional settings
 * {cwd}/templates/post.html  optional page template
 * ```
 */
export class Site {
  readonly root: string;
  readonly postsDir: string;
  readonly outputDir: string;
  readonly indexFile: string;
  readonly config: SiteConfig;
  readonly reporter: Reporter;
  readonly reconciler: IndexReconciler;

  private now: () => Date;
  private markdown = createMarkdownParser();
  private template: ((view: PostView) => string) | undefined;

  constructor(options: SiteOptions = {}) {
    this.root = resolve(options.cwd || ".");
    this.postsDir = join(this.root, POSTS_DIR);
    this.outputDir = join(this.root, OUTPUT_DIR);
    this.indexFile = join(this.root, INDEX_FILE);
    this.now = options.now ?? (() => new Date());
    this.reporter = options.reporter ?? console;

    mkdirSync(this.postsDir, { recursive: true });
    mkdirSync(this.outputDir, { recursive: true });

    this.config = loadSiteConfig(join(this.root, CONFIG_FILE), this.now().getFullYear());
    this.reconciler = new IndexReconciler({
      indexFile: this.indexFile,
      sectionId: this.config.sectionId,
      reporter: this.reporter,
    });
  }

  private postTemplate() {
    if (!this.template) {
      const custom = join(this.root, "templates", "post.html");
      this.template = existsSync(custom) ? loadPostTemplate(custom) : loadPostTemplate();
    }
    return this.template;
  }

  /** Markdown sources, sorted by name. */
  markdownFiles(): string[] {
    return readdirSync(this.postsDir)
      .filter((file) => file.endsWith(".md"))
      .sort();
  }

  /** Rendered posts, sorted by name. */
  htmlFiles(): string[] {
    return readdirSync(this.outputDir)
      .filter((file) => file.endsWith(".html"))
      .sort();
  }

  /** `file` as given (relative to the root), else inside posts/, with or without `.md`. */
  resolveSource(file: string): string {
    const candidates = [isAbsolute(file) ? file : join(this.root, file), join(this.postsDir, file)];
    if (!file.endsWith(".md")) candidates.push(join(this.postsDir, `${file}.md`));
    const found = candidates.find((path) => existsSync(path));
    if (!found) {
      throw new BlogError("NOT_FOUND", `File ${file} not found`);
    }
    return found;
  }

  readPost(path: string): Post {
    return readPost(path, { now: this.now, markdown: this.markdown });
  }

  /** Renders `path` into blog/, overwriting the previous page. */
  generatePost(path: string): Post {
    this.reporter.info(`Processing ${path}...`);
    const post = this.readPost(path);
    const output = join(this.outputDir, post.htmlFilename);
    writeFileSync(output, renderPost(post, this.config, this.postTemplate()));
    this.reporter.info(`Generated ${output}`);
    return post;
  }

  processSingleFile(file: string): ReconcileResult & { post: Post } {
    const post = this.generatePost(this.resolveSource(file));
    return { ...this.reconciler.reconcileOne(post), post };
  }

  /**
   * Renders every source and rebuilds the blog section from the ones that
   * rendered. Failing files are reported and skipped. With nothing rendered
   * the index is left alone.
   */
  rebuildAll(): { posts: Post[]; failures: Failure[] } {
    this.reporter.info("Rebuilding all blog posts...");
    const posts: Post[] = [];
    const failures: Failure[] = [];
    for (const file of this.markdownFiles()) {
      const path = join(this.postsDir, file);
      try {
        posts.push(this.generatePost(path));
      } catch (error) {
        this.reporter.error(`Error processing ${path}: ${errorMessage(error)}`);
        failures.push({ file, error });
      }
    }
    if (posts.length) {
      this.reconciler.rebuildAll(posts);
    } else {
      this.reporter.warn(`No posts rendered, ${this.indexFile} left untouched`);
    }
    this.reporter.info(`Rebuilt ${posts.length} blog posts`);
    return { posts, failures };
  }

  /** Writes a new source from the post skeleton, `My Post` -> posts/my-post.md. */
  newPost(name: string): string {
    const slug = name.trim().toLowerCase().replace(/\s+/g, "-");
    if (!slug) {
      throw new Error("Post name is required");
    }
    const file = join(this.postsDir, `${slug}.md`);
    if (existsSync(file)) {
      throw new BlogError("EXISTS", `Post '${file}' already exists`);
    }
    const render = compile<{ date: string }>(readFileSync(NEW_POST_TEMPLATE, "utf-8"), "{ date }");
    writeFileSync(file, render({ date: isoDate(this.now()) }));
    this.reporter.info(`Created new post: ${file}`);
    return file;
  }
}
