import { resolve } from "path";
import sade from "sade";

import { version } from "../package.json";
import { main, preview, type CLIOptions } from "./cli";

sade("blogsync [file]", true)
  .version(version)
  .describe("Render markdown posts to static HTML and keep index.html in sync.")
  .example("posts/my-new-post.md")
  .example("--rebuild-all")
  .example("--verify")
  .example("--new 'My New Post'")
  .option("-C, --cwd", "Site root", ".")
  .option("--rebuild-all", "Render every post and rebuild the blog section", false)
  .option("--verify", "Check that sources, pages and index entries match", false)
  .option("--status", "Show counts of sources, pages and index entries", false)
  .option("--list", "List the markdown sources", false)
  .option("--new", "Create posts/<name>.md from the post skeleton")
  .option("--preview", "Serve the site locally, on port 8000 unless given")
  .action((file: string | undefined, options: CLIOptions) => {
    if (options.preview !== undefined) {
      const port = typeof options.preview === "boolean" ? 8000 : Number(options.preview);
      const server = preview(resolve(options.cwd || "."), port);
      process.stdin.on("data", (e) => {
        if (e.toString().startsWith("q")) {
          server.close();
          process.exit();
        }
      });
      return;
    }
    process.exitCode = main(file, options);
  })
  .parse(process.argv);
