#!/usr/bin/env node
/**
 * bin/mockwork.ts — Entry point for the `mockwork` CLI command.
 *
 *   mockwork replay scenario.json
 *   mockwork log --mock repo --outcome unmatched
 */

const { program } = await import('../commands/index.js');
program.parse();
