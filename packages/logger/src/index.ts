// Main exports for the logging package

export { createFileDestination, type FileDestination, resolveLogFilePath } from "./file";
export { createNodeLogger, type LifecycleLogger, withServerContext } from "./node";
export * from "./redaction";
export * from "./types";
