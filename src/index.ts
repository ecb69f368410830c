#!/usr/bin/env node

import { Command } from 'commander';
import { chatsCommand } from './cli/chats.js';
import type { GlobalOptions } from './cli/context.js';
import { initSessionCommand } from './cli/init-session.js';
import { pullCommand } from './cli/pull.js';
import { reportCommand } from './cli/report.js';
import { runCommand } from './cli/run.js';
import { DEFAULT_CONFIG_PATH } from './config/config.js';

const program = new Command();

program
  .name('chat-digest')
  .description('Incremental group chat archive with daily Markdown digests')
  .version('1.0.0')
  .option('-c, --config <path>', 'Config file', DEFAULT_CONFIG_PATH)
  .option('-v, --verbose', 'Debug logging');

function globals(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

async function runAction(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

program
  .command('init-session')
  .description('Log in interactively and store the session')
  .action(() => runAction(() => initSessionCommand(globals())));

program
  .command('pull')
  .description('Fetch new messages from every configured chat and classify threads')
  .option('--reclassify', 'Recompute thread assignments from scratch')
  .action((options) => runAction(() => pullCommand(globals(), options)));

program
  .command('report')
  .description('Write the daily report from stored messages')
  .option('-d, --date <date>', 'Day to report (YYYY-MM-DD), default today')
  .option('--chat <chat>', 'Only this chat (name, id or link)')
  .option('--refresh-summaries', 'Ignore cached thread summaries')
  .option('--no-send', 'Do not send the report to Saved Messages')
  .action((options) => runAction(() => reportCommand(globals(), options)));

program
  .command('run')
  .description('Pull, then report')
  .option('-d, --date <date>', 'Day to report (YYYY-MM-DD), default today')
  .option('--chat <chat>', 'Only this chat in the report (name, id or link)')
  .option('--reclassify', 'Recompute thread assignments from scratch')
  .option('--refresh-summaries', 'Ignore cached thread summaries')
  .option('--no-send', 'Do not send the report to Saved Messages')
  .action((options) => runAction(() => runCommand(globals(), options)));

program
  .command('chats')
  .description('List configured chats with their stored progress')
  .action(() => runAction(() => chatsCommand(globals())));

await program.parseAsync();
