/**
 * Command-line argument parsing for the bridge CLI.
 * @packageDocumentation
 */

export const Commands = ['start', 'check-keys', 'status'] as const;

export type Command = (typeof Commands)[number];

export interface CliArgs {
  command: Command;
  port?: number;
  host?: string;
  configPath?: string;
  verbose: boolean;
  help: boolean;
  version: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

function isCommand(value: string): value is Command {
  return Commands.some((c) => c === value);
}

/**
 * Parse argv (without the node and script entries).
 *
 * @throws CliUsageError on an unknown command, unknown flag or bad value
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args = [...argv];
  const parsed: CliArgs = { command: 'start', verbose: false, help: false, version: false };

  const first = args[0];
  if (first !== undefined && !first.startsWith('-')) {
    if (!isCommand(first)) throw new CliUsageError(`Unknown command: ${first}`);
    parsed.command = first;
    args.shift();
  }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const value = args[i + 1];

    if (arg === '--port') {
      const port = value === undefined ? Number.NaN : Number(value);
      if (!Number.isInteger(port) || port < 1 || port > 65535) {
        throw new CliUsageError('Invalid port number');
      }
      parsed.port = port;
      i++;
    } else if (arg === '--host') {
      if (!value) throw new CliUsageError('--host needs a value');
      parsed.host = value;
      i++;
    } else if (arg === '--config') {
      if (!value) throw new CliUsageError('--config needs a path');
      parsed.configPath = value;
      i++;
    } else if (arg === '-v' || arg === '--verbose') {
      parsed.verbose = true;
    } else if (arg === '-h' || arg === '--help') {
      parsed.help = true;
    } else if (arg === '--version') {
      parsed.version = true;
    } else {
      throw new CliUsageError(`Unknown option: ${arg ?? ''}`);
    }
  }

  return parsed;
}
