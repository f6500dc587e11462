import { spawnSync } from 'child_process';
import { DEFAULT_PAGER } from '../types/config.types';
import { logger } from './logger.service';

/**
 * Show text through $PAGER when stdout is a terminal, else write it as is
 */
export function showInPager(text: string, pager = process.env['PAGER'] || DEFAULT_PAGER): void {
  if (!process.stdout.isTTY) {
    process.stdout.write(text);
    return;
  }

  const result = spawnSync(pager, {
    input: text,
    stdio: ['pipe', 'inherit', 'inherit'],
    shell: true,
  });

  if (result.error || result.status !== 0) {
    logger.debug(`Pager "${pager}" failed: ${result.error?.message ?? `exit status ${result.status}`}`);
    process.stdout.write(text);
  }
}
