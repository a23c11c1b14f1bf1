/**
 * FileSystem service for reading configuration files with schema validation.
 */
import { readFile } from "node:fs/promises"
import { Context, Effect, Layer, Schema } from "effect"
import { FileReadError } from "../errors"

// =============================================================================
// FileSystem Service
// =============================================================================

export class FileSystem extends Context.Tag("@keyglyph/FileSystem")<
  FileSystem,
  {
    /** Read and validate JSON from a file */
    readonly readJson: <A, I>(
      path: string,
      schema: Schema.Schema<A, I>
    ) => Effect.Effect<A, FileReadError>
  }
>() {
  /** Production layer - uses node:fs */
  static readonly layer = Layer.sync(FileSystem, () =>
    FileSystem.of(
      makeFileSystem((path) =>
        Effect.tryPromise({
          try: () => readFile(path, "utf8"),
          catch: (error) => FileReadError.make({ path, cause: error }),
        })
      )
    )
  )

  /** Test layer - in-memory file system seeded with `files` */
  static readonly layerFromFiles = (files: Readonly<Record<string, string>>) =>
    Layer.sync(FileSystem, () => {
      const contents = new Map(Object.entries(files))
      return FileSystem.of(
        makeFileSystem((path) => {
          const content = contents.get(path)
          return content === undefined
            ? Effect.fail(FileReadError.make({ path, cause: new Error("File not found") }))
            : Effect.succeed(content)
        })
      )
    })

  /** Test layer - empty in-memory file system */
  static readonly testLayer = FileSystem.layerFromFiles({})
}

function makeFileSystem(
  readText: (path: string) => Effect.Effect<string, FileReadError>
): Context.Tag.Service<FileSystem> {
  const readJson = <A, I>(
    path: string,
    schema: Schema.Schema<A, I>
  ): Effect.Effect<A, FileReadError> =>
    Effect.gen(function* () {
      const content = yield* readText(path)

      const parsed = yield* Effect.try({
        try: (): unknown => JSON.parse(content),
        catch: (error) => FileReadError.make({ path, cause: error }),
      })

      return yield* Schema.decodeUnknown(schema)(parsed).pipe(
        Effect.mapError((error) => FileReadError.make({ path, cause: error }))
      )
    })

  return { readJson }
}
