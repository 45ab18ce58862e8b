import { describe, it, expect } from 'vitest';
import { CliUsageError, parseCliArgs } from '../src/cli-args.js';

describe('parseCliArgs', () => {
  it('defaults to start', () => {
    expect(parseCliArgs([])).toEqual({ command: 'start', verbose: false, help: false, version: false });
  });

  it('reads a command and its flags', () => {
    expect(parseCliArgs(['start', '--port', '9000', '--host', '127.0.0.1', '--config', 'bridge.json', '-v'])).toEqual({
      command: 'start',
      port: 9000,
      host: '127.0.0.1',
      configPath: 'bridge.json',
      verbose: true,
      help: false,
      version: false,
    });
    expect(parseCliArgs(['check-keys']).command).toBe('check-keys');
    expect(parseCliArgs(['status', '--port', '8082']).port).toBe(8082);
  });

  it('takes flags without a command', () => {
    const args = parseCliArgs(['--help', '--version']);
    expect([args.command, args.help, args.version]).toEqual(['start', true, true]);
  });

  it('rejects bad input', () => {
    expect(() => parseCliArgs(['serve'])).toThrow(new CliUsageError('Unknown command: serve'));
    expect(() => parseCliArgs(['--port', '70000'])).toThrow('Invalid port number');
    expect(() => parseCliArgs(['--port', 'abc'])).toThrow('Invalid port number');
    expect(() => parseCliArgs(['--port'])).toThrow('Invalid port number');
    expect(() => parseCliArgs(['--host'])).toThrow('--host needs a value');
    expect(() => parseCliArgs(['--config'])).toThrow('--config needs a path');
    expect(() => parseCliArgs(['--fast'])).toThrow('Unknown option: --fast');
  });
});
