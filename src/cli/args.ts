/**
 * Command line argument parsing
 */

export type CommandName = 'resolve' | 'list' | 'show' | 'index' | 'help';

export interface CliArgs {
  command: CommandName;
  /** Positional arguments after the command */
  positionals: string[];
  dir?: string;
  threshold?: number;
  json: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const COMMANDS: readonly CommandName[] = ['resolve', 'list', 'show', 'index', 'help'];

function isCommandName(value: string): value is CommandName {
  return COMMANDS.some((command) => command === value);
}

/**
 * Parse argv (without the node and script entries)
 *
 * @throws UsageError for unknown commands or options and missing option values
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = { command: 'help', positionals: [], json: false };
  const rest = [...argv];

  const first = rest.shift();
  if (first === undefined || first === '--help' || first === '-h') {
    return args;
  }
  if (!isCommandName(first)) {
    throw new UsageError(`Unknown command: ${first}`);
  }
  args.command = first;

  while (rest.length > 0) {
    const arg = rest.shift();
    if (arg === undefined) break;

    switch (arg) {
      case '--json':
        args.json = true;
        break;
      case '--dir':
      case '-d': {
        const value = rest.shift();
        if (!value) throw new UsageError(`${arg} requires a path`);
        args.dir = value;
        break;
      }
      case '--threshold':
      case '-t': {
        const value = rest.shift();
        const threshold = value === undefined || value.trim() === '' ? NaN : Number(value);
        if (Number.isNaN(threshold) || threshold < 0 || threshold > 1) {
          throw new UsageError(`${arg} requires a number between 0 and 1`);
        }
        args.threshold = threshold;
        break;
      }
      case '--help':
      case '-h':
        args.command = 'help';
        break;
      case '--':
        args.positionals.push(...rest.splice(0));
        break;
      default:
        if (arg.startsWith('-') && arg.length > 1) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        args.positionals.push(arg);
    }
  }

  return args;
}

export const HELP_TEXT = `Usage: skillroute <command> [options]

Commands:
  resolve <request...>   Find the skill for a free-text request
  list                   List loaded skills
  show <id>              Print one skill document
  index                  Print a Markdown index of skills by category
  help                   Show this help

Options:
  -d, --dir <path>       Skill directory (default: <project>/skills)
  -t, --threshold <n>    Semantic match threshold between 0 and 1
      --json             Machine-readable output`;
