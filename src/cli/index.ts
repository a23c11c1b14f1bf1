import { Effect, Either } from 'effect';
import { KEY_CODES, keyCodesInClass } from '../core/key-code';
import { runEffect } from '../effect/runtime';
import { KeyLabels, type KeyDescription } from '../effect/services';
import { decodeKeyCode } from '../effect/types';
import type { LayoutId } from '../layouts';
import { formatHelp } from './help';
import { parseCliArgs, type CliCommand } from './parse';
import { getCliVersion } from './version';

const EXIT_SUCCESS = 0;
const EXIT_USAGE = 2;
const EXIT_UNKNOWN_KEY = 4;

function printError(message: string): void {
  console.error(message);
}

function formatDescription(description: KeyDescription): string {
  return [description.name, description.keyClass, description.label, description.resolvedLabel].join('\t');
}

function printDescriptions(descriptions: readonly KeyDescription[], json: boolean): void {
  if (json) {
    console.log(JSON.stringify(descriptions));
    return;
  }
  if (descriptions.length > 0) {
    console.log(descriptions.map(formatDescription).join('\n'));
  }
}

async function runDescribe(keys: string[], layout: LayoutId | undefined, json: boolean): Promise<number> {
  const results = await runEffect(
    Effect.gen(function* () {
      const labels = yield* KeyLabels;
      return yield* Effect.forEach(keys, (input) =>
        decodeKeyCode(input).pipe(Effect.flatMap(labels.describe), Effect.either)
      );
    }),
    { layout }
  );

  const descriptions: KeyDescription[] = [];
  let exitCode = EXIT_SUCCESS;

  for (const result of results) {
    if (Either.isLeft(result)) {
      printError(`Unknown key: ${result.left.input}`);
      exitCode = EXIT_UNKNOWN_KEY;
      continue;
    }
    descriptions.push(result.right);
  }

  printDescriptions(descriptions, json);
  return exitCode;
}

async function runList(command: Extract<CliCommand, { kind: 'list' }>): Promise<number> {
  const codes = command.keyClass ? keyCodesInClass(command.keyClass) : KEY_CODES;
  const descriptions = await runEffect(
    Effect.gen(function* () {
      const labels = yield* KeyLabels;
      return yield* Effect.forEach(codes, labels.describe);
    }),
    { layout: command.layout }
  );

  printDescriptions(descriptions, command.json);
  return EXIT_SUCCESS;
}

export async function runCli(args: string[]): Promise<number> {
  const parsed = parseCliArgs(args);
  if (!parsed.ok) {
    printError(parsed.error);
    return EXIT_USAGE;
  }

  const command = parsed.command;

  switch (command.kind) {
    case 'help': {
      const version = await getCliVersion();
      console.log(formatHelp(command.topic, version));
      return EXIT_SUCCESS;
    }
    case 'version':
      console.log(await getCliVersion());
      return EXIT_SUCCESS;
    case 'describe':
      return runDescribe(command.keys, command.layout, command.json);
    case 'list':
      return runList(command);
    default:
      printError('Unknown command.');
      return EXIT_USAGE;
  }
}

export type { CliCommand };
