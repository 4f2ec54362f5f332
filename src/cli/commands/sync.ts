/**
 * Sync Commands
 *
 * `sync` promotes local points now; `status` shows what is pending and how
 * the last run went.
 */

import type { Container } from '@/container';
import type { SyncRunSummary } from '@/core/sync';
import { summarizeConflict } from '@/core/sync';
import type { CliOutput } from '../io';
import { bold, dim, formatSeparator, formatTimestamp, green, red, yellow } from '../utils/terminal';

export async function runSync(container: Container, out: CliOutput): Promise<SyncRunSummary> {
  const run = await container.coordinator.refresh();

  if (run.cancelled) {
    out.log(yellow('Sync cancelled'));
  }
  out.log(`${green('Promoted')} ${run.promoted.length}, ${red('conflicts')} ${run.conflicts.length}`);
  for (const conflict of run.conflicts.map(summarizeConflict)) {
    out.log(`  ${bold(conflict.correctPhrase)} ${dim(`[${conflict.reason}]`)} ${conflict.message}`);
  }
  return run;
}

export async function runStatus(container: Container, out: CliOutput): Promise<void> {
  const status = await container.coordinator.status();

  out.log(bold('Sync status'));
  out.log(formatSeparator(40));
  out.log(`  Signed in:     ${status.isAuthenticated ? 'yes' : 'no (guest)'}`);
  out.log(`  Pending:       ${status.pendingCount}`);
  out.log(`  Last run:      ${formatTimestamp(status.lastRunAt)}`);
  out.log(`  Last success:  ${formatTimestamp(status.lastSuccessAt)}`);
  if (status.lastError) {
    out.log(`  Last error:    ${red(status.lastError)}`);
  }
  for (const conflict of status.lastConflicts) {
    out.log(`  ${yellow('!')} ${conflict.correctPhrase} ${dim(`[${conflict.reason}]`)}`);
  }
}
