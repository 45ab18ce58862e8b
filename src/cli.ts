#!/usr/bin/env node
/**
 * messages-bridge CLI
 *
 * Usage:
 *   messages-bridge [command] [options]
 *
 * Commands:
 *   start (default)    Start the bridge server
 *   check-keys         Probe every configured upstream key and exit
 *   status             Check whether a local bridge is answering /health
 *
 * Options:
 *   --port <number>    Port to listen on (default: 8082)
 *   --host <string>    Host to bind to (default: 0.0.0.0)
 *   --config <path>    JSON config file (or BRIDGE_CONFIG_PATH)
 *   -v, --verbose      Enable debug logging
 *   -h, --help         Show this help message
 *   --version          Show version
 *
 * @packageDocumentation
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { CliUsageError, parseCliArgs, type CliArgs } from './cli-args.js';
import { DEFAULT_CONFIG, loadConfig, type BridgeConfig } from './config.js';
import { ConfigError } from './errors.js';
import { probeHealth } from './health.js';
import { probeCredentials, summarizeProbe, validateRotatorKeys } from './key-probe.js';
import { createLogger } from './logger.js';
import { createBridgeContext, startBridge } from './server.js';

function readVersion(): string {
  const pkgPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  if (!existsSync(pkgPath)) return '0.0.0';
  const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

const VERSION = readVersion();

function printHelp(): void {
  console.log(`
messages-bridge - Messages API to Chat-Completions bridge

Usage:
  messages-bridge [command] [options]

Commands:
  start (default)    Start the bridge server
  check-keys         Probe every configured upstream key and exit
  status             Check whether a local bridge is answering /health

Options:
  --port <number>    Port to listen on (default: 8082)
  --host <string>    Host to bind to (default: 0.0.0.0)
  --config <path>    JSON config file (or BRIDGE_CONFIG_PATH)
  -v, --verbose      Enable debug logging
  -h, --help         Show this help message
  --version          Show version

Environment Variables:
  OPENAI_API_KEY         Upstream key(s), comma list or JSON array (required)
  OPENAI_BASE_URL        Upstream base URL (default: https://api.openai.com/v1)
  BIG_MODEL              Upstream model(s) to rotate through (default: gpt-4o)
  ANTHROPIC_API_KEY      Key inbound callers must present (optional)
  REQUEST_TIMEOUT        Upstream idle timeout in seconds (default: 90)
  MAX_RETRIES            Retries for transient upstream failures (default: 2)
  MAX_TOKENS_LIMIT       Upper bound for max_tokens (default: 4096)
  MIN_TOKENS_LIMIT       Lower bound for max_tokens (default: 100)
  ENABLE_API_VALIDATION  Probe keys at startup (default: false)
  KEEP_INVALID_KEYS      Keep keys that fail the probe (default: true)
  INCLUDE_STREAM_USAGE   Ask the upstream for usage on streams (default: true)
  PASSTHROUGH_MODEL_PREFIXES  Model prefixes sent upstream unchanged
  LOG_LEVEL              debug | info | warn | error (default: info)

Example:
  OPENAI_API_KEY=sk-one,sk-two BIG_MODEL=gpt-4o,gpt-4o-mini messages-bridge
  ANTHROPIC_BASE_URL=http://localhost:8082 your-agent
`);
}

function resolveConfig(args: CliArgs): BridgeConfig {
  const server: Record<string, unknown> = {};
  if (args.port !== undefined) server['port'] = args.port;
  if (args.host !== undefined) server['host'] = args.host;
  return loadConfig({
    ...(args.configPath ? { filePath: args.configPath } : {}),
    overrides: {
      server,
      ...(args.verbose ? { logLevel: 'debug' } : {}),
    },
  });
}

async function handleCheckKeys(config: BridgeConfig): Promise<number> {
  const ctx = createBridgeContext(config, { version: VERSION });
  const results = await probeCredentials(ctx.rotator.snapshotCredentials(), ctx.probeClient, {
    model: ctx.rotator.nextModel(),
  });
  const summary = summarizeProbe(results);

  console.log('');
  console.log('🔑 Upstream Key Check');
  console.log('═════════════════════');
  for (const r of results) {
    const mark = r.valid ? '✓' : '✗';
    console.log(`  ${mark} #${r.index + 1}  ${r.preview.padEnd(12)}  ${r.message}`);
  }
  console.log('');
  console.log(`  Valid: ${summary.valid}/${summary.total} (${summary.validRate})`);
  for (const rec of summary.recommendations) {
    console.log(`  • ${rec}`);
  }
  console.log('');
  return summary.valid > 0 ? 0 : 1;
}

async function handleStatus(args: CliArgs): Promise<number> {
  const bindHost = args.host ?? DEFAULT_CONFIG.server.host;
  const host = bindHost === '0.0.0.0' ? '127.0.0.1' : bindHost;
  const url = `http://${host}:${args.port ?? DEFAULT_CONFIG.server.port}`;
  const healthy = await probeHealth(url);
  console.log(healthy ? `  🟢 Bridge is reachable at ${url}` : `  🔴 Bridge is not reachable at ${url}`);
  return healthy ? 0 : 1;
}

async function handleStart(config: BridgeConfig): Promise<void> {
  const ctx = createBridgeContext(config, { version: VERSION });
  const { logger } = ctx;

  console.log('');
  console.log(`  messages-bridge v${VERSION}`);
  console.log(`  ${ctx.rotator.credentialCount} upstream key(s), models: ${ctx.rotator.listModels().join(', ')}`);
  console.log('');

  if (config.keyValidation.enabled) {
    await validateRotatorKeys(ctx.rotator, ctx.probeClient, {
      model: ctx.rotator.nextModel(),
      keepInvalid: config.keyValidation.keepInvalid,
      logger,
    });
  }

  const server = await startBridge(ctx);

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    server.close((err) => {
      if (err) logger.error(`Error while closing server: ${err.message}`);
      process.exit(err ? 1 : 0);
    });
    server.closeAllConnections();
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

async function main(): Promise<void> {
  let args: CliArgs;
  try {
    args = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(`Error: ${err.message}`);
      console.error('Run with --help for usage.');
      process.exit(1);
    }
    throw err;
  }

  if (args.help) {
    printHelp();
    process.exit(0);
  }
  if (args.version) {
    console.log(`messages-bridge v${VERSION}`);
    process.exit(0);
  }

  if (args.command === 'status') {
    process.exit(await handleStatus(args));
  }

  let config: BridgeConfig;
  try {
    config = resolveConfig(args);
  } catch (err) {
    if (err instanceof ConfigError) {
      createLogger('error').error(err.message);
      process.exit(1);
    }
    throw err;
  }

  if (args.command === 'check-keys') {
    process.exit(await handleCheckKeys(config));
  }
  await handleStart(config);
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    createLogger('error').error(err.message);
  } else {
    console.error('Failed to start bridge:', err);
  }
  process.exit(1);
});
