import { createServer, type Server } from "http";
import { basename } from "path";
import sirv from "sirv";
import { errorMessage } from "./errors";
import { status, verify } from "./integrity";
import { Site } from "./site";
import type { Reporter } from "./typings";

export const USAGE = `Render markdown posts to static HTML and keep index.html in sync.

Usage:
  blogsync <markdown-file>     Render one post and update its entry in index.html
  blogsync --rebuild-all       Render every post and rebuild the blog section
  blogsync --verify            Check that sources, pages and index entries match
  blogsync --status            Show counts of sources, pages and index entries
  blogsync --new <name>        Create posts/<name>.md from the post skeleton
  blogsync --list              List the markdown sources
  blogsync --preview [port]    Serve the site locally (default port 8000)

Options:
  -C, --cwd <dir>              Site root (default: .)

Examples:
  blogsync posts/my-new-post.md
  blogsync --rebuild-all
  blogsync --verify
  blogsync --status`;

export interface CLIOptions {
  cwd?: string;
  "rebuild-all"?: boolean;
  verify?: boolean;
  status?: boolean;
  list?: boolean;
  new?: string | number | boolean;
  preview?: number | string | boolean;
}

export interface CLIContext {
  /** default: console */
  reporter?: Reporter;
  now?: () => Date;
}

/** Runs one invocation and returns the exit code. */
export function main(file: string | undefined, options: CLIOptions, context: CLIContext = {}): number {
  const reporter = context.reporter ?? console;
  const command = options["rebuild-all"] || options.verify || options.status || options.list || options.new !== undefined;
  if (!file && !command) {
    reporter.info(USAGE);
    return 1;
  }

  try {
    const site = new Site({ cwd: options.cwd, now: context.now, reporter });

    if (options["rebuild-all"]) {
      site.rebuildAll();
      return 0;
    }
    if (options.verify) {
      return verify(site).ok ? 0 : 1;
    }
    if (options.status) {
      status(site);
      return 0;
    }
    if (options.list) {
      const files = site.markdownFiles();
      reporter.info(files.length ? "Available posts:" : "No posts found");
      files.forEach((f) => reporter.info(f));
      return 0;
    }
    if (options.new !== undefined) {
      if (typeof options.new === "boolean") {
        reporter.error("Error: Post name is required");
        return 1;
      }
      const created = site.newPost(String(options.new));
      reporter.info(`Edit the file, then run: blogsync ${basename(created)}`);
      return 0;
    }

    if (file) site.processSingleFile(file);
    return 0;
  } catch (error) {
    reporter.error(`Error: ${errorMessage(error)}`);
    return 1;
  }
}

export function preview(root: string, port: number, reporter: Reporter = console): Server {
  return createServer(sirv(root, { dev: true })).listen(port, () => {
    reporter.info(`previewing at http://localhost:${port}`);
  });
}
