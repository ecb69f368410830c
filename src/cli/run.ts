import { closeContext, createTelegramClient, openContext, withRunLock, type AppContext, type GlobalOptions } from './context.js';
import { runPull } from './pull.js';
import { runReport, shouldSend, validateDate, type ReportCommandOptions } from './report.js';

export interface RunCommandOptions extends ReportCommandOptions {
  reclassify?: boolean;
}

/** Pull then report in one locked run over one connection. */
export async function runCommand(global: GlobalOptions, options: RunCommandOptions): Promise<void> {
  let ctx: AppContext | null = null;
  try {
    ctx = openContext(global);
    const app = ctx;
    validateDate(options.date);
    await withRunLock(app, async () => {
      const client = createTelegramClient(app.config, app.log);
      await client.connect();
      try {
        console.log(`Pulling ${app.config.chats.length} chat(s)...`);
        await runPull(app, client, { reclassify: options.reclassify });
        // A partial pull still gets a report over whatever is stored
        await runReport(app, shouldSend(app, options) ? client : null, options);
      } finally {
        await client.disconnect();
      }
    });
  } finally {
    closeContext(ctx);
  }
}
