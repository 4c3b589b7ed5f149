import chalk from 'chalk';
import ora from 'ora';
import { config } from '../utils/config';
import { createComponentLogger, flushLogs, logger } from '../utils/logger';
import { RenderBackendError } from '../utils/errors';
import { withCatalogConnection, ConnectionSettings } from '../database/connection';
import type { CatalogGateway } from '../database/services/types';
import { DependencyResolver } from '../graph/dependency-resolver';
import { exportCascadeGraph, GraphvizRenderer } from '../graph/exporter';
import type { GraphRenderer } from '../graph/exporter';
import { formatCascadeTable, formatSummaryTable } from '../report';
import {
  CascadeCommandOptions,
  ConnectionOptions,
  SummaryCommandOptions,
  parseNonNegativeInteger,
  parseSortKey,
  parseTimeout,
  resolveConnectionSettings,
} from './options';
import { promptPassword } from './prompt';

const cliLogger = createComponentLogger('cli');

export type CatalogConnector = <T>(
  settings: ConnectionSettings,
  work: (gateway: CatalogGateway) => Promise<T>
) => Promise<T>;

export interface CommandContext {
  connect: CatalogConnector;
  promptPassword: (message: string) => Promise<string>;
  createRenderer: (options: CascadeCommandOptions) => GraphRenderer;
}

export const defaultCommandContext: CommandContext = {
  connect: (settings, work) =>
    withCatalogConnection(settings, work, { excludedSchemas: config.catalog.excludedSchemas }),
  promptPassword,
  createRenderer: options =>
    new GraphvizRenderer({ dotPath: config.graph.dotPath, keepSource: options.keepSource === true }),
};

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function connectionSettingsFor(
  options: ConnectionOptions,
  context: CommandContext
): Promise<ConnectionSettings> {
  const settings = resolveConnectionSettings(options, config.database);

  if (settings.password === undefined && settings.url === undefined) {
    settings.password = await context.promptPassword(`Password for ${settings.user}: `);
  }

  return settings;
}

/**
 * First-level dependent and foreign key counts for every table and view of a
 * schema. Returns the process exit code.
 */
export async function runSummaryCommand(
  schema: string,
  options: SummaryCommandOptions,
  context: CommandContext = defaultCommandContext
): Promise<number> {
  if (options.verbose) {
    logger.level = 'debug';
  }

  const spinner = ora('Connecting to database...');

  try {
    const sortBy = options.sort !== undefined ? parseSortKey(options.sort) : undefined;
    const settings = await connectionSettingsFor(options, context);

    spinner.start(`Inspecting schema ${schema}...`);
    const rows = await context.connect(settings, gateway =>
      new DependencyResolver(gateway).summarize(schema, { sortBy })
    );
    spinner.succeed(`Inspected ${rows.length} objects in schema ${schema}`);

    if (rows.length === 0) {
      console.log(chalk.yellow(`No tables or views found in schema "${schema}".`));
    } else {
      console.log(formatSummaryTable(rows));
    }

    await flushLogs();
    return 0;
  } catch (error) {
    if (spinner.isSpinning) {
      spinner.fail('Summary failed');
    }
    cliLogger.debug('Summary command failed', { schema, error: errorMessage(error) });
    console.error(chalk.red(`\n❌ ${errorMessage(error)}`));
    await flushLogs();
    return 1;
  }
}

/**
 * Full cascade of dependents of one object, printed as a leveled report and
 * rendered as a graph. Returns the process exit code.
 */
export async function runCascadeCommand(
  schema: string,
  objectName: string,
  options: CascadeCommandOptions,
  context: CommandContext = defaultCommandContext
): Promise<number> {
  if (options.verbose) {
    logger.level = 'debug';
  }

  const spinner = ora('Connecting to database...');

  try {
    const maxDepth =
      options.maxDepth !== undefined
        ? parseNonNegativeInteger('--max-depth', options.maxDepth)
        : undefined;
    const timeoutMs = options.timeout !== undefined ? parseTimeout(options.timeout) : undefined;
    const settings = await connectionSettingsFor(options, context);
    // Started after the prompt so typing the password does not count
    const signal = timeoutMs !== undefined ? AbortSignal.timeout(timeoutMs) : undefined;

    spinner.start(`Resolving dependents of ${schema}.${objectName}...`);
    const cascade = await context.connect(settings, gateway =>
      new DependencyResolver(gateway).cascadeByName(schema, objectName, { maxDepth, signal })
    );
    spinner.succeed(
      `Found ${cascade.visited.length - 1} dependent objects over ${cascade.levels.length} levels`
    );

    if (options.report) {
      console.log(formatCascadeTable(cascade));
    }

    if (!options.graph) {
      await flushLogs();
      return 0;
    }

    const format = options.format ?? config.graph.format;
    const graphSpinner = ora(`Rendering ${format} graph...`).start();

    try {
      const outputPath = await exportCascadeGraph(cascade, {
        outputDir: options.outputDir ?? config.graph.outputDir,
        format,
        renderer: context.createRenderer(options),
      });
      graphSpinner.succeed(`Graph written to ${outputPath}`);
    } catch (error) {
      graphSpinner.fail('Graph rendering failed');
      if (!(error instanceof RenderBackendError)) {
        throw error;
      }
      console.error(chalk.red(`\n❌ ${error.message}`));
      await flushLogs();
      return 1;
    }

    await flushLogs();
    return 0;
  } catch (error) {
    if (spinner.isSpinning) {
      spinner.fail('Cascade failed');
    }
    cliLogger.debug('Cascade command failed', {
      schema,
      object: objectName,
      error: errorMessage(error),
    });
    console.error(chalk.red(`\n❌ ${errorMessage(error)}`));
    await flushLogs();
    return 1;
  }
}
