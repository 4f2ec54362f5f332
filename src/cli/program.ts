/**
 * `kp` Command Definitions
 *
 * Builds the commander program around a container. The entry point in
 * index.ts supplies a container built from the environment; tests supply
 * one over an in-memory database.
 */

import { Command } from 'commander';
import type { Container } from '@/container';
import { consoleOutput, type CliOutput } from './io';
import {
  runAdd,
  runArchive,
  runDelete,
  runList,
  runReview,
  runSummary,
  type AddOptions,
  type ListOptions,
  type ReviewOptions,
} from './commands/knowledge-points';
import { runStatus, runSync } from './commands/sync';
import { runImportGuest } from './commands/import-guest';

export function createProgram(container: Container, out: CliOutput = consoleOutput): Command {
  const program = new Command('kp')
    .description('Knowledge points on this device and in the cloud')
    .version('0.1.0');

  const addListOptions = (command: Command): Command =>
    command
      .option('-t, --tier <tier>', 'Only points in this tier (weak, medium, strong)')
      .option('-c, --category <category>', 'Only points in this category')
      .option('-s, --sort <sort>', 'Sort by mastery, nextReview or category')
      .option('--due', 'Only points due for review now');

  addListOptions(program.command('list').description('List active knowledge points')).action(
    async (options: ListOptions) => {
      await runList(container, out, options, false);
    }
  );

  addListOptions(program.command('archived').description('List archived knowledge points')).action(
    async (options: ListOptions) => {
      await runList(container, out, options, true);
    }
  );

  program
    .command('summary')
    .description('Totals by mastery tier')
    .action(async () => {
      await runSummary(container, out);
    });

  program
    .command('add')
    .description('Create a knowledge point')
    .argument('<category>', 'Category, e.g. "Greetings"')
    .argument('<phrase>', 'The correct phrase')
    .option('--subcategory <subcategory>', 'Subcategory')
    .option('-e, --explanation <text>', 'Why the phrase is correct')
    .option('--summary <text>', 'Key point summary')
    .action(async (category: string, phrase: string, options: AddOptions) => {
      await runAdd(container, out, category, phrase, options);
    });

  program
    .command('review')
    .description('Record a practice outcome')
    .argument('<id>', 'Effective ID of the point')
    .option('--correct', 'The answer was correct')
    .option('--wrong', 'The answer was wrong')
    .option('--severity <severity>', 'How wrong: low, medium, high or critical')
    .action(async (id: string, options: ReviewOptions) => {
      await runReview(container, out, id, options);
    });

  program
    .command('archive')
    .description('Archive a knowledge point')
    .argument('<id>', 'Effective ID of the point')
    .action(async (id: string) => {
      await runArchive(container, out, id, true);
    });

  program
    .command('unarchive')
    .description('Restore an archived knowledge point')
    .argument('<id>', 'Effective ID of the point')
    .action(async (id: string) => {
      await runArchive(container, out, id, false);
    });

  program
    .command('delete')
    .description('Delete a knowledge point')
    .argument('<id>', 'Effective ID of the point')
    .action(async (id: string) => {
      await runDelete(container, out, id);
    });

  program
    .command('sync')
    .description('Promote local knowledge points to the cloud now')
    .action(async () => {
      await runSync(container, out);
    });

  program
    .command('status')
    .description('Show pending points and the last sync run')
    .action(async () => {
      await runStatus(container, out);
    });

  program
    .command('import-guest')
    .description('Import guest records exported by an older version')
    .argument('<file>', 'JSON file holding an array of guest records')
    .action(async (file: string) => {
      await runImportGuest(container, out, file);
    });

  return program;
}
