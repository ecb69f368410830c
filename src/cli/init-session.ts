import { createInterface } from 'readline/promises';
import { loadConfig } from '../config/config.js';
import { createLogger } from '../logger.js';
import { createTelegramClient, type GlobalOptions } from './context.js';

/** Interactive login that stores the session string for later runs. */
export async function initSessionCommand(global: GlobalOptions): Promise<void> {
  const log = createLogger(global.verbose ? 'debug' : undefined);
  const config = loadConfig(global.config);
  const client = createTelegramClient(config, log);
  const rl = createInterface({ input: process.stdin, output: process.stdout });

  try {
    const created = await client.authorize(config.phone, (question) => rl.question(question));
    console.log(created ? `Session saved to ${config.sessionPath}` : 'Session is already authorized.');
  } finally {
    rl.close();
    await client.disconnect();
  }
}
