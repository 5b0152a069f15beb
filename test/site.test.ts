import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { join } from "path";
import { afterEach, describe, expect, it } from "vitest";
import { BlogError, Site } from "../src";
import { cleanup, memoryReporter, tempRoot, writeIndex } from "./helpers";

const now = () => new Date(2024, 4, 6);

function setup({ index = true } = {}) {
  const root = tempRoot();
  if (index) writeIndex(root);
  const reporter = memoryReporter();
  const site = new Site({ cwd: root, now, reporter });
  return { root, reporter, site };
}

function writePost(root: string, name: string, date: string, title = name) {
  writeFileSync(join(root, "posts", name), `---\ntitle: ${title}\ndate: "${date}"\n---\n\nBody of ${title}.\n`);
}

afterEach(cleanup);

describe("Site", () => {
  it("creates the source and output directories", () => {
    const { root } = setup();
    expect(existsSync(join(root, "posts"))).toBe(true);
    expect(existsSync(join(root, "blog"))).toBe(true);
  });

  it("applies site.yml", () => {
    const root = tempRoot();
    writeFileSync(join(root, "site.yml"), "name: Notes\nsectionId: writing\n");
    const site = new Site({ cwd: root, now, reporter: memoryReporter() });
    expect(site.config.name).toBe("Notes");
    expect(site.reconciler.sectionId).toBe("writing");
  });
});

describe("resolveSource", () => {
  it("looks in posts/ and adds the extension", () => {
    const { root, site } = setup();
    writePost(root, "hello.md", "2024-01-01");
    const expected = join(root, "posts", "hello.md");
    expect(site.resolveSource("posts/hello.md")).toBe(expected);
    expect(site.resolveSource("hello.md")).toBe(expected);
    expect(site.resolveSource("hello")).toBe(expected);
    expect(site.resolveSource(expected)).toBe(expected);
  });

  it("throws when nothing matches", () => {
    const { site } = setup();
    expect(() => site.resolveSource("missing.md")).toThrowError("File missing.md not found");
  });
});

describe("processSingleFile", () => {
  it("renders the page and adds the entry", () => {
    const { root, site } = setup();
    writePost(root, "hello.md", "2024-01-01", "Hello");

    const result = site.processSingleFile("hello.md");

    expect(result.status).toBe("inserted");
    expect(result.post.htmlFilename).toBe("hello.html");
    const page = readFileSync(join(root, "blog", "hello.html"), "utf-8");
    expect(page).toContain("<title>Hello - Blog</title>");
    expect(page).toContain("<p>Body of Hello.</p>");
    expect(site.reconciler.listExistingEntries().map((e) => e.href)).toEqual(["blog/hello.html"]);
  });

  it("updates the entry on the second run", () => {
    const { root, site } = setup();
    writePost(root, "hello.md", "2024-01-01", "Hello");
    site.processSingleFile("hello.md");
    writePost(root, "hello.md", "2024-01-01", "Hello again");

    expect(site.processSingleFile("hello.md").status).toBe("updated");
    expect(site.reconciler.listExistingEntries().map((e) => e.title)).toEqual(["Hello again"]);
  });

  it("uses the site template when there is one", () => {
    const { root, site } = setup();
    mkdirSync(join(root, "templates"));
    writeFileSync(join(root, "templates", "post.html"), "<main>{ post.title }</main>");
    writePost(root, "hello.md", "2024-01-01", "Hello");
    site.processSingleFile("hello.md");
    expect(readFileSync(join(root, "blog", "hello.html"), "utf-8")).toBe("<main>Hello</main>");
  });

  it("propagates a missing index after writing the page", () => {
    const { root, site } = setup({ index: false });
    writePost(root, "hello.md", "2024-01-01");
    expect(() => site.processSingleFile("hello.md")).toThrowError(BlogError);
    expect(existsSync(join(root, "blog", "hello.html"))).toBe(true);
    expect(existsSync(join(root, "index.html"))).toBe(false);
  });
});

describe("rebuildAll", () => {
  it("renders every post and skips the broken ones", () => {
    const { root, site, reporter } = setup();
    writePost(root, "a.md", "2024-01-01");
    writePost(root, "c.md", "2024-06-01");
    writePost(root, "b.md", "2024-03-01");
    writeFileSync(join(root, "posts", "broken.md"), "---\ntitle: [unclosed\n---\n");
    writeFileSync(join(root, "posts", "notes.txt"), "not a post");

    const { posts, failures } = site.rebuildAll();

    expect(posts.map((p) => p.filename)).toEqual(["a.md", "b.md", "c.md"]);
    expect(failures.map((f) => f.file)).toEqual(["broken.md"]);
    expect(reporter.errors).toHaveLength(1);
    expect(reporter.errors[0].startsWith(`Error processing ${join(root, "posts", "broken.md")}: `)).toBe(true);
    expect(site.htmlFiles()).toEqual(["a.html", "b.html", "c.html"]);
    expect(site.reconciler.listExistingEntries().map((e) => e.stem)).toEqual(["c", "b", "a"]);
    expect(reporter.infos[reporter.infos.length - 1]).toBe("Rebuilt 3 blog posts");
  });

  it("skips sources that are not utf-8", () => {
    const { root, site, reporter } = setup();
    writePost(root, "good.md", "2024-01-01");
    const bad = join(root, "posts", "bad.md");
    writeFileSync(bad, Buffer.from("---\ntitle: Caf\xe9\n---\n", "latin1"));

    const { posts, failures } = site.rebuildAll();

    expect(posts.map((p) => p.filename)).toEqual(["good.md"]);
    expect(failures.map((f) => f.file)).toEqual(["bad.md"]);
    expect(reporter.errors).toEqual([`Error processing ${bad}: ${bad} is not valid UTF-8`]);
    expect(site.htmlFiles()).toEqual(["good.html"]);
  });

  it("leaves the index alone when nothing rendered", () => {
    const { root, site, reporter } = setup();
    const before = readFileSync(join(root, "index.html"), "utf-8");
    expect(site.rebuildAll().posts).toEqual([]);
    expect(readFileSync(join(root, "index.html"), "utf-8")).toBe(before);
    expect(reporter.warnings).toEqual([`No posts rendered, ${join(root, "index.html")} left untouched`]);
  });
});

describe("newPost", () => {
  it("writes a skeleton dated today", () => {
    const { root, site } = setup();
    const file = site.newPost("My New Post");
    expect(file).toBe(join(root, "posts", "my-new-post.md"));
    expect(readFileSync(file, "utf-8")).toContain('date: "2024-05-06"\n');

    const post = site.readPost(file);
    expect(post.title).toBe("Your Post Title Here");
    expect(post.date).toBe("2024-05-06");
  });

  it("never overwrites a post", () => {
    const { site } = setup();
    site.newPost("twice");
    expect(() => site.newPost("twice")).toThrowError(BlogError);
  });
});
