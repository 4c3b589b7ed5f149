#!/usr/bin/env node
import process from 'process';

import { Command } from 'commander';
import chalk from 'chalk';
import { logger } from '../utils/logger';
import { runCascadeCommand, runSummaryCommand } from './commands';
import type { CascadeCommandOptions, SummaryCommandOptions } from './options';

function addConnectionOptions(command: Command): Command {
  return command
    .option('-u, --user <user>', 'Database user name (default: DATABASE_USER or current user)')
    .option('-P, --password <password>', 'User password. Will be prompted for if not set')
    .option('-h, --host <host>', 'Database host address (default: DATABASE_HOST or localhost)')
    .option('-p, --port <port>', 'Database port (default: DATABASE_PORT or 5432)')
    .option('-d, --database <name>', 'Database name (default: DATABASE_NAME or current user)')
    .option('-v, --verbose', 'Enable verbose logging');
}

const program = new Command();

program
  .name('pg-dependents')
  .description(
    'Summary report or cascaded dependency graph for PostgreSQL tables, views and functions'
  )
  .version('0.1.0')
  // -h is the database host, as in psql
  .helpOption('--help', 'Display help for command');

// Summary command
addConnectionOptions(
  program
    .command('summary')
    .description(
      'Report counts of dependent objects and foreign keys at the first level for all tables and views of a schema'
    )
    .argument('<schema>', 'Schema to inspect')
    .option('--sort <key>', 'Sort rows by name, dependents or foreign-keys (default: catalog order)')
).action(async (schema: string, options: SummaryCommandOptions) => {
  process.exitCode = await runSummaryCommand(schema, options);
});

// Cascade command
addConnectionOptions(
  program
    .command('cascade')
    .description(
      'Report and graph every object depending on a table, view or function, cascading through views, functions and foreign keys'
    )
    .argument('<schema>', 'Schema of the root object')
    .argument('<object>', 'Table, view or function to start from')
    .option('--max-depth <levels>', 'Stop expanding after this many levels')
    .option('--timeout <ms>', 'Abort the cascade when it runs longer than this')
    .option('--output-dir <dir>', 'Directory for the graph file (default: GRAPH_OUTPUT_DIR or current directory)')
    .option('--format <format>', 'Graph file format understood by Graphviz (default: GRAPH_FORMAT or pdf)')
    .option('--keep-source', 'Keep the generated DOT source next to the graph file')
    .option('--no-graph', 'Only print the report')
    .option('--no-report', 'Only render the graph')
).action(async (schema: string, objectName: string, options: CascadeCommandOptions) => {
  process.exitCode = await runCascadeCommand(schema, objectName, options);
});

// Help and error handling
program.configureHelp({
  sortSubcommands: true,
});

program.on('command:*', () => {
  console.error(chalk.red(`Invalid command: ${program.args.join(' ')}`));
  console.log(chalk.blue('See --help for a list of available commands.'));
  process.exit(1);
});

process.on('unhandledRejection', reason => {
  logger.error('Unhandled rejection', { reason: String(reason) });
  console.error(chalk.red('\n💥 Unhandled promise rejection:'), reason);
  process.exit(1);
});

program.parseAsync().catch(error => {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exit(1);
});
