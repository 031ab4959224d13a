/**
 * notion-mirror mirror command
 *
 * Mirrors a local folder into a Notion page: one page per directory and per
 * file, text files split into paragraph blocks, everything else attached as a
 * placeholder file reference.
 *
 * Exports `runMirror` so the mirror can be started programmatically.
 */

import * as path from 'path';
import { Command, Option } from 'commander';
import chalk from 'chalk';
import type { Logger } from 'pino';
import { MirrorWalker } from '../mirror/mirror-walker.js';
import { buildMirrorConfig, validateMirrorConfig } from '../mirror/config.js';
import { ConfigurationError, describeError } from '../mirror/errors.js';
import type { ChunkSplitMode } from '../mirror/chunker.js';
import type { MirrorStats, RemoteErrorPolicy } from '../mirror/types.js';
import type { DocumentService } from '../notion/document-service.js';
import { NotionDocumentService } from '../notion/notion-document-service.js';
import { DryRunDocumentService } from '../notion/dry-run-document-service.js';
import { normalizePageId } from '../notion/page-id.js';
import { resolveNotionToken } from '../utils/credentials.js';
import { createLogger } from '../utils/logger.js';

/** Options as commander hands them to the action */
export interface MirrorCommandOptions {
  folder: string;
  page: string;
  verbose?: boolean;
  onError?: string;
  includeHidden?: boolean;
  splitAt?: string;
  timeout?: string;
  dryRun?: boolean;
}

/** Validated options for runMirror */
export interface RunMirrorOptions {
  /** Local folder (or single file) to mirror */
  folder: string;
  /** Destination Notion page id or URL */
  page: string;
  onRemoteError?: RemoteErrorPolicy;
  includeHidden?: boolean;
  splitAt?: ChunkSplitMode;
  /** Abort the run after this many milliseconds */
  timeoutMs?: number;
  /** Log instead of calling Notion */
  dryRun?: boolean;
  /** External cancellation (e.g. Ctrl-C) */
  signal?: AbortSignal;
  /** Suppress the stdout summary */
  quiet?: boolean;
}

/** Collaborators that tests and embedders can replace */
export interface RunMirrorDeps {
  logger?: Logger;
  /** Skip token lookup and use this one */
  token?: string;
  createService?: (token: string, logger: Logger) => DocumentService;
}

export interface RunMirrorResult {
  /** Page created for the root folder */
  rootPageId: string;
  stats: MirrorStats;
}

const ERROR_POLICIES: readonly RemoteErrorPolicy[] = ['abort', 'skip'];
const SPLIT_MODES: readonly ChunkSplitMode[] = ['length', 'whitespace'];

function parseChoice<T extends string>(flag: string, value: string, choices: readonly T[]): T {
  const match = choices.find((c) => c === value);
  if (match === undefined) {
    throw new ConfigurationError(`${flag} must be one of: ${choices.join(', ')} (got "${value}")`);
  }
  return match;
}

/**
 * Turn raw commander options into RunMirrorOptions.
 * Throws ConfigurationError for invalid values.
 */
export function parseCommandOptions(raw: MirrorCommandOptions): RunMirrorOptions {
  let timeoutMs: number | undefined;
  if (raw.timeout !== undefined) {
    timeoutMs = Number(raw.timeout);
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
      throw new ConfigurationError(`--timeout must be a positive number of milliseconds (got "${raw.timeout}")`);
    }
  }

  return {
    folder: raw.folder,
    page: raw.page,
    onRemoteError: raw.onError === undefined ? undefined : parseChoice('--on-error', raw.onError, ERROR_POLICIES),
    includeHidden: raw.includeHidden,
    splitAt: raw.splitAt === undefined ? undefined : parseChoice('--split-at', raw.splitAt, SPLIT_MODES),
    timeoutMs,
    dryRun: raw.dryRun ?? false,
  };
}

/**
 * Combine the caller's signal and the optional deadline into one signal.
 * Returns a dispose function that clears the deadline timer.
 */
function buildSignal(options: RunMirrorOptions): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const external = options.signal;

  const onExternalAbort = (): void => {
    controller.abort(external?.reason);
  };
  if (external?.aborted) {
    controller.abort(external.reason);
  } else {
    external?.addEventListener('abort', onExternalAbort, { once: true });
  }

  let timer: NodeJS.Timeout | undefined;
  if (options.timeoutMs !== undefined) {
    const ms = options.timeoutMs;
    timer = setTimeout(() => {
      controller.abort(new Error(`Timed out after ${ms} ms`));
    }, ms);
    timer.unref();
  }

  return {
    signal: controller.signal,
    dispose: () => {
      if (timer) clearTimeout(timer);
      external?.removeEventListener('abort', onExternalAbort);
    },
  };
}

/**
 * Run a mirror.
 *
 * 1. Validates the destination page id and configuration
 * 2. Resolves the Notion token (skipped for dry runs)
 * 3. Walks the folder, creating pages and blocks
 * 4. Prints a summary unless quiet
 *
 * Configuration errors are raised before any Notion call.
 */
export async function runMirror(
  options: RunMirrorOptions,
  deps?: RunMirrorDeps,
): Promise<RunMirrorResult> {
  const quiet = options.quiet ?? false;
  const log = (msg: string) => {
    if (!quiet) console.log(msg);
  };

  const logger = deps?.logger ?? createLogger();
  const pageId = normalizePageId(options.page);

  const config = buildMirrorConfig({
    onRemoteError: options.onRemoteError,
    includeHidden: options.includeHidden,
    splitAt: options.splitAt,
  });
  const configErrors = validateMirrorConfig(config);
  if (configErrors.length > 0) {
    throw new ConfigurationError(`Invalid configuration: ${configErrors.join('; ')}`);
  }

  let service: DocumentService;
  if (options.dryRun) {
    service = new DryRunDocumentService(logger);
  } else {
    const token = deps?.token ?? resolveNotionToken();
    service = deps?.createService?.(token, logger) ?? new NotionDocumentService({ token, logger });
  }

  const folder = path.resolve(options.folder);
  const walker = new MirrorWalker({ service, logger, config });
  const { signal, dispose } = buildSignal(options);

  let rootPageId: string;
  try {
    rootPageId = await walker.mirror(folder, pageId, { signal });
  } finally {
    dispose();
  }

  const stats = walker.getStats();
  printSummary(log, folder, rootPageId, stats, options.dryRun ?? false);

  return { rootPageId, stats };
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n !== 1 ? 's' : ''}`;
}

function printSummary(
  log: (msg: string) => void,
  folder: string,
  rootPageId: string,
  stats: MirrorStats,
  dryRun: boolean,
): void {
  const verb = dryRun ? 'Would mirror' : 'Mirrored';
  log(chalk.green(`${verb} ${folder} to page ${rootPageId}`));
  log(chalk.dim(
    `  ${plural(stats.documentsCreated, 'page')}, ` +
    `${plural(stats.textBlocksAppended, 'text block')}, ` +
    `${plural(stats.fileBlocksAppended, 'file block')}`
  ));

  if (stats.fallbacks > 0) {
    log(chalk.yellow(`  ${plural(stats.fallbacks, 'file')} attached as reference instead of text`));
  }

  if (stats.failures.length > 0) {
    log(chalk.yellow(`  ${plural(stats.failures.length, 'subtree')} skipped:`));
    for (const failure of stats.failures.slice(0, 5)) {
      log(chalk.red(`    - ${failure.path}: ${failure.message}`));
    }
    if (stats.failures.length > 5) {
      log(chalk.dim(`    ... and ${stats.failures.length - 5} more`));
    }
  }
}

/**
 * Register the mirror command. It is the default command, so
 * `notion-mirror -f ./docs -p <id>` works without naming it.
 *
 * Exit codes: 0 on success, 1 when the run fails, 2 when it finished but
 * skipped subtrees under `--on-error skip`.
 */
export function registerMirrorCommand(program: Command, deps?: RunMirrorDeps): void {
  program
    .command('mirror', { isDefault: true })
    .description('Mirror a local folder structure into a Notion page')
    .requiredOption('-f, --folder <path>', 'Path to the local root folder to mirror')
    .requiredOption('-p, --page <id>', 'Notion destination page ID (with or without hyphens)')
    .option('-v, --verbose', 'Enable debug logging')
    .addOption(
      new Option('--on-error <mode>', 'What to do when a subtree fails')
        .choices([...ERROR_POLICIES])
    )
    .option('--include-hidden', 'Mirror entries whose name starts with a dot')
    .addOption(
      new Option('--split-at <mode>', 'Where to split long text into blocks')
        .choices([...SPLIT_MODES])
    )
    .option('--timeout <ms>', 'Abort the run after this many milliseconds')
    .option('--dry-run', 'Log what would be created without calling Notion')
    .action(async (raw: MirrorCommandOptions) => {
      const logger = deps?.logger ?? createLogger({ verbose: raw.verbose });
      const controller = new AbortController();
      const onSigint = (): void => {
        controller.abort(new Error('Interrupted'));
      };
      process.once('SIGINT', onSigint);

      try {
        const options = parseCommandOptions(raw);
        const result = await runMirror({ ...options, signal: controller.signal }, { ...deps, logger });
        if (result.stats.failures.length > 0) {
          process.exitCode = 2;
        }
      } catch (err) {
        console.error(chalk.red(`Error: ${describeError(err)}`));
        process.exitCode = 1;
      } finally {
        process.off('SIGINT', onSigint);
      }
    });
}
