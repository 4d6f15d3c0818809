#!/usr/bin/env node

// CLI entry point
// - Command name: `phrasemask` with subcommands analyze, crack, generate,
//   translate and counts.
// - Every subcommand builds one engine (character classes, or a dictionary
//   catalog with --dict) and prints results to stdout; diagnostics go to
//   stderr with the [phrasemask] prefix.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ErrorPresenter,
  InternalError,
  LOG_PREFIX,
  XorShift32,
  formatSecurityReport,
  isPhraseMaskError,
  translateTemplate,
  type PhraseMaskError,
} from '@phrasemask/core';

import { printEffectiveConfig, printMaskShape } from './debug.js';
import { buildEngine, loadCatalog, loadTarget } from './engine.js';
import {
  parseSearchOptions,
  resolveHashRate,
  resolveMaskArgument,
  resolveSampleCount,
  resolveSeed,
  resolveTargetSource,
  type CliOptions,
  type CountsOptions,
} from './flags.js';
import {
  renderCLIView,
  renderCategoryCounts,
  renderOutcomeSummary,
} from './render.js';

const program = new Command();

program
  .name('phrasemask')
  .description(
    'Estimate passphrase entropy from class masks and search for digests'
  )
  .version('0.1.0');

function withEngineOptions(command: Command): Command {
  return command
    .option('-d, --dict <file>', 'Dictionary JSON file (word → definitions)')
    .option(
      '-f, --filter <names...>',
      'Dictionary filters to apply: shorter_than_10, shorter_than_8, longer_than_3, alpha_only, ascii_only'
    )
    .option('-t, --template', 'Read the mask as a ?u?l?d?s template')
    .option('--debug', 'Print effective configuration to stderr');
}

withEngineOptions(
  program
    .command('analyze')
    .description('Report possibilities, bits of entropy and time to crack')
    .argument('<mask...>', 'Class tokens, e.g. noun verb digit')
    .option('--rate <hashes>', 'Hash rate in hashes per second')
).action(async (maskParts: string[], options: CliOptions) => {
  try {
    const mask = resolveMaskArgument(maskParts, options.template);
    const hashRate = resolveHashRate(options.rate);
    if (options.debug) printEffectiveConfig('analyze', { mask, hashRate });

    const engine = await buildEngine({
      dict: options.dict,
      filter: options.filter,
      hashRate,
    });
    if (options.debug) printMaskShape(engine, mask);

    const lines = formatSecurityReport(engine.security(mask));
    process.stdout.write(lines.join('\n') + '\n');
  } catch (err: unknown) {
    handleCliError(err);
  }
});

withEngineOptions(
  program
    .command('crack')
    .description('Enumerate a mask and compare candidates against digests')
    .argument('<mask...>', 'Class tokens, e.g. lower lower digit')
    .option('--hash <hex>', 'Single target digest; stops at the first match')
    .option('--hashes <file>', 'JSON array of digests; counts every match')
    .option('--timeout <seconds>', 'Stop after this many seconds (0 = never)', '0')
    .option('--algorithm <name>', 'Digest algorithm: sha1|sha256|sha512|md5', 'sha1')
    .option('--no-time', 'Do not report elapsed time')
    .option(
      '--stop-when-all-matched',
      'With --hashes, stop once every digest has been matched'
    )
).action(async (maskParts: string[], options: CliOptions) => {
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);
  try {
    const mask = resolveMaskArgument(maskParts, options.template);
    const targetSource = resolveTargetSource(options);
    const searchOptions = parseSearchOptions(options);
    if (options.debug) {
      printEffectiveConfig('crack', { mask, target: targetSource, ...searchOptions });
    }

    const engine = await buildEngine({ dict: options.dict, filter: options.filter });
    if (options.debug) printMaskShape(engine, mask);
    const target = await loadTarget(targetSource);

    const outcome = await engine.crack(mask, target, {
      ...searchOptions,
      signal: controller.signal,
    });

    if (outcome.state === 'found') {
      process.stdout.write(`${outcome.plaintext}\n`);
      return;
    }
    process.stderr.write(`${LOG_PREFIX} ${renderOutcomeSummary(outcome)}\n`);
    if (targetSource.kind === 'single') {
      // Nothing recovered
      process.exitCode = 1;
      return;
    }
    process.stdout.write(`${outcome.count}\n`);
  } catch (err: unknown) {
    handleCliError(err);
  } finally {
    process.off('SIGINT', onInterrupt);
  }
});

withEngineOptions(
  program
    .command('generate')
    .description('Print random passphrases drawn from a mask')
    .argument('<mask...>', 'Class tokens, e.g. adjective noun digit digit')
    .option('-n, --count <number>', 'Number of samples', '1')
    .option('--seed <number>', 'Seed for reproducible samples')
).action(async (maskParts: string[], options: CliOptions) => {
  try {
    const mask = resolveMaskArgument(maskParts, options.template);
    const count = resolveSampleCount(options.count);
    const seed = resolveSeed(options.seed);
    if (options.debug) printEffectiveConfig('generate', { mask, count, seed });

    const engine = await buildEngine({ dict: options.dict, filter: options.filter });
    const random =
      seed === undefined ? undefined : new XorShift32(seed, mask).asSource();

    const samples: string[] = [];
    for (let i = 0; i < count; i += 1) {
      samples.push(engine.generate(mask, random));
    }
    process.stdout.write(samples.join('\n') + '\n');
  } catch (err: unknown) {
    handleCliError(err);
  }
});

program
  .command('translate')
  .description('Translate a ?u?l?d?s template into a mask')
  .argument('<template>', 'Template such as ?u?l?l?d')
  .action((template: string) => {
    process.stdout.write(`${translateTemplate(template)}\n`);
  });

program
  .command('counts')
  .description('Count dictionary entries per category')
  .requiredOption('-d, --dict <file>', 'Dictionary JSON file')
  .option('-f, --filter <names...>', 'Dictionary filters to apply')
  .action(async (options: CountsOptions) => {
    try {
      const catalog = await loadCatalog(options.dict, options.filter);
      process.stdout.write(renderCategoryCounts(catalog.categoryCounts()) + '\n');
    } catch (err: unknown) {
      handleCliError(err);
    }
  });

function handleCliError(err: unknown): void {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  let error: PhraseMaskError;
  if (isPhraseMaskError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new InternalError({
      message: message || 'Unexpected error',
      cause: err instanceof Error ? err : undefined,
    });
  }

  process.stderr.write(renderCLIView(presenter.formatForCLI(error)) + '\n');
  process.exitCode = error.getExitCode();
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch(handleCliError);
}

export { program };

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
