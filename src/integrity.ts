import { existsSync } from "fs";
import { stem } from "./post";
import type { Site } from "./site";

export interface VerifyReport {
  ok: boolean;
  /** stems of sources without a rendered page */
  missingHtml: string[];
  /** stems of sources without an index entry */
  missingIndex: string[];
  /** stems of rendered pages without a source */
  orphanHtml: string[];
  /** stems of index entries without a source */
  orphanIndex: string[];
}

export interface StatusReport {
  markdown: number;
  html: number;
  index: number;
  inSync: boolean;
}

function stems(files: string[]) {
  return new Set(files.map((file) => stem(file)));
}

/**
 * Cross-checks posts/*.md, blog/*.html and the index entries by file stem.
 * Only missing pages and missing entries fail the check, orphans are warnings.
 */
export function verify(site: Site): VerifyReport {
  const { reporter } = site;
  const report: VerifyReport = { ok: false, missingHtml: [], missingIndex: [], orphanHtml: [], orphanIndex: [] };

  if (!existsSync(site.indexFile)) {
    reporter.warn(`Warning: ${site.indexFile} not found`);
    return report;
  }

  const markdown = stems(site.markdownFiles());
  const html = stems(site.htmlFiles());
  const index = new Set(site.reconciler.listExistingEntries().map((entry) => entry.stem));

  for (const name of markdown) {
    if (!html.has(name)) {
      reporter.error(`Missing HTML file for: ${name}.md`);
      report.missingHtml.push(name);
    }
  }
  for (const name of markdown) {
    if (!index.has(name)) {
      reporter.error(`Missing index entry for: ${name}.md`);
      report.missingIndex.push(name);
    }
  }
  for (const name of html) {
    if (!markdown.has(name)) {
      reporter.warn(`Orphaned HTML file (no markdown source): ${name}.html`);
      report.orphanHtml.push(name);
    }
  }
  for (const name of index) {
    if (!markdown.has(name)) {
      reporter.warn(`Orphaned index entry (no markdown source): ${name}`);
      report.orphanIndex.push(name);
    }
  }

  report.ok = !report.missingHtml.length && !report.missingIndex.length;
  if (report.ok) {
    reporter.info(`Blog integrity check passed: ${markdown.size} posts verified`);
  }
  return report;
}

export function status(site: Site): StatusReport {
  const { reporter } = site;
  const markdown = site.markdownFiles().length;
  const html = site.htmlFiles().length;
  const index = new Set(site.reconciler.listExistingEntries().map((entry) => entry.filename)).size;
  const inSync = markdown === html && markdown === index;

  reporter.info("Blog Status:");
  reporter.info(`  Markdown files: ${markdown}`);
  reporter.info(`  HTML files: ${html}`);
  reporter.info(`  Index entries: ${index}`);
  if (inSync) {
    reporter.info("  All files in sync");
  } else {
    reporter.warn("  Inconsistency detected - consider running --rebuild-all");
  }
  return { markdown, html, index, inSync };
}
