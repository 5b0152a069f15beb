export interface BuildOptions {
  /** default: process.cwd() */
  cwd?: string;
  /** default: () => new Date() */
  now?: () => Date;
  /** default: console */
  reporter?: Reporter;
}

export interface Reporter {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface Post {
  title: string; // extracted from frontmatter, or the filename
  date: string; // YYYY-MM-DD, not validated
  description: string;
  body: string; // rendered html
  filename: string; // posts/{filename}
  htmlFilename: string; // blog/{htmlFilename}
  url: string; // link target inside index.html
}

export interface IndexEntry {
  title: string;
  href: string;
  date: string; // as displayed
  description: string;
  filename: string; // basename of href
  stem: string;
}

export type ReconcileResult =
  | { status: "updated"; entry: IndexEntry }
  | { status: "inserted"; entry: IndexEntry };

export interface SiteLink {
  label: string;
  href: string;
}

export interface SiteConfig {
  name: string;
  tagline: string;
  footer: string;
  links: SiteLink[];
  sectionId: string;
}
