import { APP_NAME } from './config.js';

export type CliArgs =
  | { kind: 'run'; url?: string }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; message: string };

export const USAGE = `Usage: ${APP_NAME} [url]

Read an RSS or Atom feed in your terminal.

Arguments:
  url            feed to load on startup (optional)

Options:
  -h, --help     show this help
  -v, --version  show the version

Keys:
  Up/Down move, Enter open, r refresh, Esc edit URL, Tab back to list, q quit

Examples:
  ${APP_NAME}
  ${APP_NAME} https://example.com/feed.xml`;

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const positionals: string[] = [];

  for (const arg of argv) {
    if (arg === '-h' || arg === '--help') return { kind: 'help' };
    if (arg === '-v' || arg === '--version') return { kind: 'version' };
    if (arg.startsWith('-')) return { kind: 'error', message: `unknown option: ${arg}` };
    positionals.push(arg);
  }

  if (positionals.length > 1) {
    return { kind: 'error', message: `expected at most one URL, got ${positionals.length}` };
  }
  return positionals.length === 1 ? { kind: 'run', url: positionals[0] } : { kind: 'run' };
}
