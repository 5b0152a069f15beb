export type BlogErrorCode =
  | "MISSING_INDEX"
  | "MISSING_SECTION"
  | "NOT_FOUND"
  | "EXISTS"
  | "INVALID_CONFIG"
  | "INVALID_FRONTMATTER"
  | "INVALID_ENCODING";

export class BlogError extends Error {
  readonly code: BlogErrorCode;
  constructor(code: BlogErrorCode, message: string) {
    super(message);
    this.name = "BlogError";
    this.code = code;
  }
}

export function isBlogError(error: unknown, code?: BlogErrorCode): error is BlogError {
  return error instanceof BlogError && (code === undefined || error.code === code);
}

export function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}
