#!/usr/bin/env node
import { Command } from 'commander';

import {
  buildGateway,
  createModels,
  describeConfig,
  loadConfigFile,
  resolveConfigPath,
  validateReferences,
} from './config/index.js';
import { describeError } from './errors.js';
import { createLogger, parseLogLevel, setLogLevel } from './logging.js';
import { Gateway } from './server/index.js';
import packageJson from '../package.json' with { type: 'json' };

interface CommandOptions {
  config?: string;
  logLevel?: string;
}

const CONFIG_HELP = 'Configuration file (default: $MCP_GATEWAY_CONFIG or config.yaml)';
const LOG_LEVEL_HELP = 'debug, info, warn or error (default: $LOG_LEVEL or info)';

const logger = createLogger('cli');

function applyLogLevel(options: CommandOptions): void {
  if (options.logLevel === undefined) {
    return;
  }

  const level = parseLogLevel(options.logLevel);
  if (!level) {
    throw new Error(`Unknown log level "${options.logLevel}"`);
  }
  setLogLevel(level);
}

async function serve(options: CommandOptions): Promise<void> {
  applyLogLevel(options);

  const path = resolveConfigPath(options.config);
  const config = await loadConfigFile(path);
  const plan = await buildGateway(config);
  const gateway = await Gateway.start(plan.bindings, [...plan.toolProviders.values()]);

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info(`Received ${signal}, shutting down`);
    gateway.close().then(
      () => {
        process.exitCode = 0;
      },
      (error: unknown) => {
        logger.error(`Shutdown failed: ${describeError(error)}`);
        process.exitCode = 1;
      },
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

async function check(options: CommandOptions): Promise<void> {
  applyLogLevel(options);

  const path = resolveConfigPath(options.config);
  const config = await loadConfigFile(path);
  validateReferences(config);
  createModels(config);

  console.log(`${path} is valid.`);
  for (const line of describeConfig(config)) {
    console.log(line);
  }
}

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('mcp-gateway')
    .description('HTTP gateway exposing LLM workspaces with MCP tool calling.')
    .version(packageJson.version);

  program
    .command('serve', { isDefault: true })
    .description('Start every workspace listener')
    .option('-c, --config <file>', CONFIG_HELP)
    .option('-l, --log-level <level>', LOG_LEVEL_HELP)
    .action(serve);

  program
    .command('check')
    .description('Validate the configuration without connecting to anything')
    .option('-c, --config <file>', CONFIG_HELP)
    .option('-l, --log-level <level>', LOG_LEVEL_HELP)
    .action(check);

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  logger.error(describeError(error));
  process.exitCode = 1;
});
