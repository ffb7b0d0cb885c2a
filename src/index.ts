/**
 * Barrel exports.
 *
 * Library-style entry: classifier, scoring engines, chat replies and the
 * batch helpers. The server and CLI entry points are not re-exported.
 */
export * from "./alerts";
export * from "./alzheimer";
export * from "./batch";
export * from "./app";
export * from "./chat";
export * from "./classifier";
export * from "./config";
export * from "./engine";
export * from "./errors";
export * from "./features";
export * from "./heart";
export * from "./logger";
export * from "./medicines";
export * from "./risk";
export * from "./schemas";
export * from "./types";
