export type HelpTopic = 'root' | 'describe' | 'list';

function formatHeader(topic: HelpTopic, version?: string): string {
  const base = version && version !== 'unknown' ? `keyglyph v${version}` : 'keyglyph';
  if (topic === 'root') {
    return base;
  }
  return `${base} ${topic}`;
}

const ROOT_HELP = (version?: string): string[] => [
  formatHeader('root', version),
  '',
  'Usage:',
  '  keyglyph <command> [<args>]',
  '',
  'Commands:',
  '  describe         Show class and labels for key names.',
  '  list             List canonical key names.',
  '',
  'Options:',
  '  -h, --help       Show help (try `keyglyph describe --help`).',
  '  -v, --version    Show version.',
  '',
  'Environment:',
  '  KEYGLYPH_LAYOUT        Bundled layout: none | us | de | fr (default: none).',
  '  KEYGLYPH_LAYOUT_FILE   JSON file mapping key names to glyphs.',
  '  KEYGLYPH_LOG_LEVEL     Log level (default: Warning).',
  '',
  'Exit codes:',
  '  0  success',
  '  2  usage error',
  '  4  unknown key name',
];

const DESCRIBE_HELP = (version?: string): string[] => [
  formatHeader('describe', version),
  '',
  'Usage:',
  '  keyglyph describe <key>... [--layout <id>] [--json]',
  '',
  'Description:',
  '  Accepts canonical names (KeyA, ArrowUp) and legacy aliases (A, 7, OSLeft,',
  '  VolumeUp, LaunchMediaPlayer). Names are case-sensitive.',
  '',
  'Options:',
  '  --layout <id>   Bundled layout to resolve labels with (none | us | de | fr).',
  '  --json          Print a JSON array.',
];

const LIST_HELP = (version?: string): string[] => [
  formatHeader('list', version),
  '',
  'Usage:',
  '  keyglyph list [--class <class>] [--layout <id>] [--json]',
  '',
  'Options:',
  '  --class <class>   Only keys of this class (WritingSystem, Functional,',
  '                    ControlPad, ArrowPad, Numpad, Function, Media, Legacy,',
  '                    Gamepad, NonStandard).',
  '  --layout <id>     Bundled layout to resolve labels with.',
  '  --json            Print a JSON array.',
];

const HELP_TOPICS: Record<HelpTopic, (version?: string) => string[]> = {
  root: ROOT_HELP,
  describe: DESCRIBE_HELP,
  list: LIST_HELP,
};

export function formatHelp(topic: HelpTopic, version?: string): string {
  return HELP_TOPICS[topic](version).join('\n');
}
