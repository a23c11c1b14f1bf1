/**
 * Domain models using Schema.Class for validation and serialization.
 */
import { Option, Schema } from "effect"

// =============================================================================
// Run Metadata
// =============================================================================

/** A named custom variable attached to a run */
export class RunVariable extends Schema.Class<RunVariable>("RunVariable")({
  name: Schema.String,
  value: Schema.String,
}) {}

/**
 * Additional information about a run, like the platform and region of the
 * game. Every field is optional; empty strings mean "not specified".
 */
export class RunMetadata extends Schema.Class<RunMetadata>("RunMetadata")({
  /** speedrun.com run id this run is associated with */
  runId: Schema.optionalWith(Schema.String, { default: () => "" }),
  platformName: Schema.optionalWith(Schema.String, { default: () => "" }),
  /** `false` may also mean the information is not known */
  usesEmulator: Schema.optionalWith(Schema.Boolean, { default: () => false }),
  regionName: Schema.optionalWith(Schema.String, { default: () => "" }),
  variables: Schema.optionalWith(Schema.Array(RunVariable), { default: () => [] }),
}) {
  /** Iterate over the variables as name/value pairs, in insertion order */
  *variableEntries(): IterableIterator<readonly [string, string]> {
    for (const variable of this.variables) {
      yield [variable.name, variable.value]
    }
  }

  /** Value of the first variable with the given name */
  variable(name: string): Option.Option<string> {
    return Option.fromNullable(this.variables.find((variable) => variable.name === name)).pipe(
      Option.map((variable) => variable.value)
    )
  }
}
