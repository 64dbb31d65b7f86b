#!/usr/bin/env node

import { Command } from 'commander';
import { ExitCode } from '../types';
import { startServer } from '../api/server';
import { loadConfig } from '../config';
import { PolicyEngine, createPolicyEngine } from '../core/engine';
import { ConsoleLogger } from '../core/logger';
import { VERSION } from '../version';
import { SchemaOptions, ValidateOptions, schemaCommand, validateCommand } from './commands';

const logger = new ConsoleLogger();
const program = new Command();

// Built on first use; `--version` and `--help` never pay for the schema
let engine: PolicyEngine | undefined;

function getEngine(): PolicyEngine {
  if (!engine) {
    engine = createPolicyEngine(loadConfig(undefined, logger), logger);
  }
  return engine;
}

/**
 * Run a command, turning anything it throws into a fatal exit
 */
function run(command: () => ExitCode): void {
  try {
    process.exitCode = command();
  } catch (error) {
    logger.error(`warden: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = ExitCode.Fatal;
  }
}

program.name('warden').description('Warden - policy schema validation').version(VERSION);

/**
 * Validate command
 */
program
  .command('validate')
  .description('Validate one or more policy files')
  .argument('[configs...]', 'Policy files (YAML or JSON)')
  .option('-c, --config <file>', 'Policy file')
  .option('-v, --verbose', 'Print debug output')
  .action((configs: string[], options: ValidateOptions) => {
    logger.setVerbose(options.verbose === true);
    run(() => validateCommand(configs, options, getEngine(), logger));
  });

/**
 * Schema command
 */
program
  .command('schema')
  .description('Show the resources, actions and filters policies can use')
  .argument('[selector]', 'RESOURCE[.CATEGORY[.ITEM]]')
  .option('--summary', 'Print capability counts')
  .option('--json', 'Dump the JSON schema')
  .action((selector: string | undefined, options: SchemaOptions) => {
    run(() => schemaCommand(selector, options, getEngine(), logger));
  });

/**
 * Server command
 */
program
  .command('serve')
  .description('Start the Warden HTTP server')
  .option('-p, --port <port>', 'Port to listen on')
  .action(async (options: { port?: string }) => {
    const instance = getEngine();
    const port = options.port ? parseInt(options.port, 10) : instance.getConfig().server.port;
    logger.log('\nStarting Warden server...\n');
    await startServer(port, instance, logger);
  });

program.parseAsync().catch((error: unknown) => {
  logger.error(`warden: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = ExitCode.Fatal;
});
