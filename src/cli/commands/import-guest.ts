/**
 * import-guest Command
 *
 * Loads a JSON array of guest records exported by older app versions into
 * the Local Store. Old-format entries (string `id`) and invalid entries
 * are skipped; the guest limit does not apply.
 */

import { readFile } from 'node:fs/promises';
import type { Container } from '@/container';
import { importLegacyGuestRecords, type LegacyImportResult } from '@/storage';
import type { CliOutput } from '../io';
import { green, yellow } from '../utils/terminal';

export async function runImportGuest(
  container: Container,
  out: CliOutput,
  file: string
): Promise<LegacyImportResult> {
  const contents = await readFile(file, 'utf8');
  const parsed: unknown = JSON.parse(contents);

  const result = await importLegacyGuestRecords(container.localStore, parsed);

  out.log(`${green('Imported')} ${result.imported} guest points`);
  if (result.skipped > 0) {
    out.log(yellow(`Skipped ${result.skipped} entries`));
  }
  return result;
}
