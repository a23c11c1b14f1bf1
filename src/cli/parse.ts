import { type HelpTopic } from './help';
import { KEY_CODE_CLASSES, type KeyCodeClass } from '../core/key-code';
import { LAYOUT_IDS, type LayoutId } from '../layouts';

export type CliCommand =
  | { kind: 'help'; topic: HelpTopic }
  | { kind: 'version' }
  | { kind: 'describe'; keys: string[]; layout?: LayoutId; json: boolean }
  | { kind: 'list'; keyClass?: KeyCodeClass; layout?: LayoutId; json: boolean };

export type ParseResult =
  | { ok: true; command: CliCommand }
  | { ok: false; error: string };

const HELP_FLAGS = new Set(['-h', '--help']);
const VERSION_FLAGS = new Set(['-v', '--version']);

function shouldShowHelp(args: string[]): boolean {
  if (args.length === 0) return true;
  if (args[0] === 'help') return true;
  return args.some((arg) => HELP_FLAGS.has(arg));
}

function resolveHelpTopic(args: string[]): HelpTopic {
  const tokens = args[0] === 'help' ? args.slice(1) : args;
  const first = tokens.find((arg) => !arg.startsWith('-'));

  if (first === 'describe') return 'describe';
  if (first === 'list') return 'list';
  return 'root';
}

function readOptionValue(args: string[], index: number, flag: string): { value: string; nextIndex: number } | { error: string } {
  const arg = args[index];
  const eqIndex = arg.indexOf('=');
  if (eqIndex >= 0) {
    return { value: arg.slice(eqIndex + 1), nextIndex: index };
  }
  const next = args[index + 1];
  if (!next) {
    return { error: `Missing value for ${flag}.` };
  }
  return { value: next, nextIndex: index + 1 };
}

function isOption(arg: string, flag: string): boolean {
  return arg === flag || arg.startsWith(`${flag}=`);
}

function parseLayout(value: string): LayoutId | null {
  return LAYOUT_IDS.find((id) => id === value) ?? null;
}

function parseKeyClass(value: string): KeyCodeClass | null {
  return KEY_CODE_CLASSES.find((keyClass) => keyClass === value) ?? null;
}

function parseDescribe(args: string[]): ParseResult {
  const keys: string[] = [];
  let layout: LayoutId | undefined;
  let json = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--json') {
      json = true;
      continue;
    }
    if (isOption(arg, '--layout')) {
      const value = readOptionValue(args, i, '--layout');
      if ('error' in value) return { ok: false, error: value.error };
      const parsed = parseLayout(value.value);
      if (!parsed) return { ok: false, error: `Unknown layout: ${value.value}` };
      layout = parsed;
      i = value.nextIndex;
      continue;
    }
    if (arg === '--') {
      keys.push(...args.slice(i + 1));
      break;
    }
    if (arg.startsWith('--')) {
      return { ok: false, error: `Unknown argument: ${arg}` };
    }

    keys.push(arg);
  }

  if (keys.length === 0) {
    return { ok: false, error: 'Missing key name.' };
  }

  return { ok: true, command: { kind: 'describe', keys, layout, json } };
}

function parseList(args: string[]): ParseResult {
  let keyClass: KeyCodeClass | undefined;
  let layout: LayoutId | undefined;
  let json = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--json') {
      json = true;
      continue;
    }
    if (isOption(arg, '--class')) {
      const value = readOptionValue(args, i, '--class');
      if ('error' in value) return { ok: false, error: value.error };
      const parsed = parseKeyClass(value.value);
      if (!parsed) return { ok: false, error: `Unknown key class: ${value.value}` };
      keyClass = parsed;
      i = value.nextIndex;
      continue;
    }
    if (isOption(arg, '--layout')) {
      const value = readOptionValue(args, i, '--layout');
      if ('error' in value) return { ok: false, error: value.error };
      const parsed = parseLayout(value.value);
      if (!parsed) return { ok: false, error: `Unknown layout: ${value.value}` };
      layout = parsed;
      i = value.nextIndex;
      continue;
    }

    return { ok: false, error: `Unknown argument: ${arg}` };
  }

  return { ok: true, command: { kind: 'list', keyClass, layout, json } };
}

export function parseCliArgs(args: string[]): ParseResult {
  if (shouldShowHelp(args)) {
    return { ok: true, command: { kind: 'help', topic: resolveHelpTopic(args) } };
  }

  if (VERSION_FLAGS.has(args[0])) {
    return { ok: true, command: { kind: 'version' } };
  }

  const [command, ...rest] = args;
  if (command === 'describe') {
    return parseDescribe(rest);
  }

  if (command === 'list') {
    return parseList(rest);
  }

  return { ok: false, error: `Unknown command: ${command}` };
}
