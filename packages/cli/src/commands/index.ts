/**
 * commands/index.ts — Commander program, configured and exported without .parse().
 *
 * Imported by:
 *   src/bin/mockwork.ts
 *   test/commands.test.ts
 */

import { program } from 'commander';
import { replayCommand } from './replay.js';
import { logCommand } from './log.js';

program
  .name('mockwork')
  .description(
    'Replay mock scenarios through the dispatch and verification core.\n' +
    'Dispatch and verification events are logged under $MOCKWORK_HOME/logs.',
  )
  .version('0.1.0');

program.addCommand(replayCommand);
program.addCommand(logCommand);

export { program };
