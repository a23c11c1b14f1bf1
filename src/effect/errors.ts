/**
 * Domain errors with Schema.TaggedError for type-safe, serializable errors.
 */
import { Schema } from "effect"

// =============================================================================
// Key Code Errors
// =============================================================================

/** Text that is neither a canonical key name nor a known alias */
export class UnknownKeyCodeError extends Schema.TaggedError<UnknownKeyCodeError>()(
  "UnknownKeyCodeError",
  {
    input: Schema.String,
  }
) {}

// =============================================================================
// Keyboard Layout Errors
// =============================================================================

/** The layout query or a layout table could not produce an answer */
export class KeyboardLayoutError extends Schema.TaggedError<KeyboardLayoutError>()(
  "KeyboardLayoutError",
  {
    layout: Schema.String,
    cause: Schema.Defect,
  }
) {}

// =============================================================================
// File Errors
// =============================================================================

/** Reading or decoding a file failed */
export class FileReadError extends Schema.TaggedError<FileReadError>()(
  "FileReadError",
  {
    path: Schema.String,
    cause: Schema.Defect,
  }
) {}
