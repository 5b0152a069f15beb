export * from "./typings";
export * from "./template";
export * from "./date";
export * from "./errors";
export * from "./post";
export { createMarkdownParser } from "./marked";
export { IndexReconciler, type ReconcilerOptions } from "./reconcile";
export { verify, status, type VerifyReport, type StatusReport } from "./integrity";
export { Site, type SiteOptions } from "./site";
export { loadSiteConfig } from "./config";
