/**
 * Effect services barrel export.
 */
export * from "./FileSystem"
export * from "./KeyboardLayout"
export * from "./KeyLabels"
