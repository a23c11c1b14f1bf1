/**
 * Schemas for key identities and the text they are stored as.
 */
import { Effect, Option, ParseResult, Schema } from "effect"
import {
  KEY_CODE_CLASSES,
  isKeyCode,
  parseKeyCode,
} from "../core/key-code"
import { UnknownKeyCodeError } from "./errors"

/** A canonical key name */
export const KeyCode = Schema.String.pipe(
  Schema.filter(isKeyCode, {
    identifier: "KeyCode",
    description: "a canonical key name, such as KeyA or ArrowUp",
  })
)
export type KeyCode = typeof KeyCode.Type

/** One of the ten key classes */
export const KeyCodeClass = Schema.Literal(...KEY_CODE_CLASSES)
export type KeyCodeClass = typeof KeyCodeClass.Type

/**
 * Key code stored as text. Decoding accepts canonical names and aliases;
 * encoding always produces the canonical name.
 */
export const KeyCodeFromString = Schema.transformOrFail(Schema.String, KeyCode, {
  strict: true,
  decode: (text, _options, ast) =>
    Option.match(parseKeyCode(text), {
      onNone: () =>
        ParseResult.fail(new ParseResult.Type(ast, text, `Unknown key code ${JSON.stringify(text)}`)),
      onSome: (code) => ParseResult.succeed(code),
    }),
  encode: (code) => ParseResult.succeed(code),
})

/** Parse a key name, failing with UnknownKeyCodeError */
export const decodeKeyCode = (text: string): Effect.Effect<KeyCode, UnknownKeyCodeError> =>
  Option.match(parseKeyCode(text), {
    onNone: () => Effect.fail(UnknownKeyCodeError.make({ input: text })),
    onSome: (code) => Effect.succeed(code),
  })
