#!/usr/bin/env node
/**
 * kubeconverge CLI - Synchronise Kubernetes resources with manifest files
 *
 * This tool provides commands for converging a cluster:
 * - show: Print the normalized manifest set
 * - check: Validate manifests locally
 * - diff: Show what would change on the cluster
 * - update: Patch existing objects (and create missing ones with --create)
 * - create: Create and patch objects
 * - delete: Delete every object of the manifest set
 *
 * Exit codes: 0 success, 1 unsuccessful run, 2 invalid input or configuration.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { createLogger, parseLogLevel } from './api/logger.js';
import { KubernetesTransport } from './api/kubernetes.js';
import {
  checkCommand,
  createCommand,
  deleteCommand,
  diffCommand,
  showCommand,
  updateCommand,
  type DeleteOptions,
  type DiffOptions,
  type ShowOptions,
  type UpdateOptions,
} from './commands/index.js';
import { ConfigError, describeClusterConfig, resolveClusterConfig } from './config/index.js';
import { UnknownOutputFormatError, OUTPUT_FORMATS, DEFAULT_OUTPUT_FORMAT } from './manifests/emit.js';
import { FileManifestSource, InlineManifestSource } from './manifests/loader.js';
import { isInputError } from './reconcile/errors.js';
import { DEFAULT_NAMESPACE } from './reconcile/normalize.js';
import type { CommandContext, CommandResult, GlobalOptions, ManifestInputOptions } from './types.js';
import { error, printResult, verbose as verboseLog } from './utils/output.js';

const VERSION = '0.1.0';

const EXIT_FAILURE = 1;
const EXIT_USAGE = 2;

// =============================================================================
// Option Parsers
// =============================================================================

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

function positiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function positiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return parsed;
}

// =============================================================================
// Context
// =============================================================================

const abort = new AbortController();
process.once('SIGINT', () => {
  error('Interrupted; waiting for in-flight operations to finish');
  abort.abort();
});

/**
 * Create the command context from parsed options
 * Resolves cluster configuration from CLI, env, or project file
 */
function createContext(options: GlobalOptions): CommandContext {
  const cluster = resolveClusterConfig({
    flags: {
      server: options.server,
      kubeconfig: options.kubeconfig,
      context: options.context,
      namespace: options.namespace,
    },
  });

  if (options.verbose) {
    verboseLog(`Project file: ${cluster.configPath ?? '(none)'}`, true);
    for (const line of describeClusterConfig(cluster)) {
      verboseLog(line, true);
    }
  }

  const logger = createLogger({
    level: parseLogLevel(process.env.KUBECONVERGE_LOG_LEVEL) ?? (options.verbose ? 'debug' : 'warn'),
    json: process.env.KUBECONVERGE_LOG_JSON === 'true',
  });

  let transport: KubernetesTransport | undefined;
  const kubernetes = (): KubernetesTransport => (transport ??= new KubernetesTransport(cluster.config, { logger }));

  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    cluster,
    logger,
    transport: kubernetes,
    defaultNamespace: () => cluster.config.namespace ?? kubernetes().contextNamespace() ?? DEFAULT_NAMESPACE,
    source: (input: ManifestInputOptions) =>
      input.exec !== undefined ? new InlineManifestSource(input.exec) : new FileManifestSource(input.file ?? []),
    signal: abort.signal,
  };
}

function exitCodeFor(err: unknown): number {
  if (isInputError(err) || err instanceof ConfigError || err instanceof UnknownOutputFormatError) {
    return EXIT_USAGE;
  }
  return EXIT_FAILURE;
}

function describeError(err: unknown): string {
  if (isInputError(err)) return err.toUserMessage();
  return err instanceof Error ? err.message : String(err);
}

/**
 * Run a command handler and exit with its status
 */
async function run<T>(
  label: string,
  command: Command,
  handler: (ctx: CommandContext) => Promise<CommandResult<T>>,
  printJson = true
): Promise<void> {
  try {
    const ctx = createContext(command.optsWithGlobals<GlobalOptions>());
    const result = await handler(ctx);

    if (ctx.outputFormat === 'json' && printJson) {
      printResult(result, ctx.outputFormat);
    } else if (ctx.outputFormat === 'human' && !result.success && result.errors === undefined) {
      error(result.message);
    }

    process.exit(result.success ? 0 : EXIT_FAILURE);
  } catch (err) {
    error(`${label} failed: ${describeError(err)}`);
    process.exit(exitCodeFor(err));
  }
}

// =============================================================================
// Program
// =============================================================================

/**
 * Main CLI program
 */
const program = new Command()
  .name('kubeconverge')
  .description('Synchronise Kubernetes resources with manifest files')
  .version(VERSION)
  .addOption(new Option('-s, --server <host:port>', 'Address of the Kubernetes API server (e.g. a kubectl proxy)'))
  .addOption(new Option('-n, --namespace <ns>', 'Namespace for namespaced manifests without one'))
  .addOption(new Option('--context <name>', 'kubeconfig context'))
  .addOption(new Option('--kubeconfig <path>', 'kubeconfig file'))
  .addOption(new Option('--json', 'Output JSON for CI/automation').default(false))
  .addOption(new Option('-v, --verbose', 'Enable verbose logging').default(false));

function withInput(command: Command): Command {
  return command
    .addOption(new Option('-f, --file <path>', 'Manifest file or directory (repeatable)').argParser(collect))
    .addOption(new Option('-e, --exec <document>', 'Inline YAML or JSON manifest document').conflicts('file'));
}

/**
 * show command - Print the normalized manifest set
 */
withInput(program.command('show'))
  .description('Show the expanded manifest set')
  .addOption(
    new Option('--format <fmt>', 'Output format').choices([...OUTPUT_FORMATS]).default(DEFAULT_OUTPUT_FORMAT)
  )
  .action(async (_options: unknown, command: Command) => {
    await run('Show', command, (ctx) => showCommand(ctx, command.opts<ShowOptions>()), false);
  });

/**
 * check command - Validate manifests locally
 */
withInput(program.command('check'))
  .description('Validate manifests without contacting the cluster')
  .action(async (_options: unknown, command: Command) => {
    await run('Check', command, (ctx) => checkCommand(ctx, command.opts<ManifestInputOptions>()));
  });

/**
 * diff command - Show what would change
 */
withInput(program.command('diff'))
  .description('Show differences between the manifests and the cluster')
  .option('--prune', 'Include managed objects no longer in the manifests')
  .option('--force', 'Treat fields changed outside kubeconverge as overridable')
  .action(async (_options: unknown, command: Command) => {
    await run('Diff', command, (ctx) => diffCommand(ctx, command.opts<DiffOptions>()));
  });

function withApplyOptions(command: Command): Command {
  return withInput(command)
    .option('--prune', 'Delete managed objects no longer in the manifests')
    .option('--force', 'Override fields changed outside kubeconverge')
    .option('--wait', 'Wait for created and patched objects to become ready')
    .addOption(new Option('--timeout <seconds>', 'Wait deadline in seconds').argParser(positiveNumber))
    .addOption(new Option('--concurrency <n>', 'Objects applied in parallel per tier').argParser(positiveInteger))
    .option('--dry-run', 'Show the plan without applying it');
}

/**
 * update command - Converge existing objects
 */
withApplyOptions(program.command('update'))
  .description('Update existing resources')
  .option('--create', 'Create missing resources')
  .action(async (_options: unknown, command: Command) => {
    await run('Update', command, (ctx) => updateCommand(ctx, command.opts<UpdateOptions>()));
  });

/**
 * create command - Converge with creation enabled
 */
withApplyOptions(program.command('create'))
  .description('Create missing resources and update existing ones')
  .action(async (_options: unknown, command: Command) => {
    await run('Create', command, (ctx) => createCommand(ctx, command.opts<UpdateOptions>()));
  });

/**
 * delete command - Delete the manifest set
 */
withInput(program.command('delete'))
  .description('Delete the resources named by the manifests')
  .addOption(new Option('--concurrency <n>', 'Objects deleted in parallel per tier').argParser(positiveInteger))
  .option('--dry-run', 'Show the plan without deleting')
  .action(async (_options: unknown, command: Command) => {
    await run('Delete', command, (ctx) => deleteCommand(ctx, command.opts<DeleteOptions>()));
  });

// Parse and execute
program.exitOverride((err) => {
  process.exit(err.exitCode === 0 ? 0 : EXIT_USAGE);
});

await program.parseAsync();
