import * as readline from 'node:readline';
import { fileURLToPath } from 'node:url';
import { errorMessage } from '@switchyard/core';
import { bootstrap } from './bootstrap.js';
import { BUILTIN_HANDLERS, createEchoChat } from './builtin-handlers.js';
import { handleConsoleLine } from './console.js';

async function main(): Promise<void> {
  const configPath = process.env['SWITCHYARD_CONFIG']
    ?? fileURLToPath(new URL('../../../config/default.json5', import.meta.url));

  const app = await bootstrap({
    configPath,
    chat: createEchoChat(),
    handlers: BUILTIN_HANDLERS,
  });

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: 'you> ',
  });

  const handleShutdown = async (): Promise<void> => {
    rl.close();
    await app.shutdown();
    process.exit(0);
  };

  process.on('SIGINT', () => void handleShutdown());
  process.on('SIGTERM', () => void handleShutdown());

  console.log(`Switchyard console — agent "${app.config.dispatcher.agentName}"`);
  console.log('Commands: use tool: <name> {json} | use capability: <name> {json}');
  console.log('Type /handlers, /log [n], or /quit.\n');
  rl.prompt();

  const handleLine = async (line: string): Promise<void> => {
    try {
      const reply = await handleConsoleLine(app, line);
      if (reply.kind === 'quit') {
        console.log('Goodbye.');
        await handleShutdown();
        return;
      }
      for (const out of reply.lines) console.log(out);
    } catch (err) {
      console.error(`Error: ${errorMessage(err)}`);
    }
    rl.prompt();
  };

  rl.on('line', (line: string) => void handleLine(line));
  rl.on('close', () => void handleShutdown());
}

main().catch((err) => {
  console.error('Fatal:', err);
  process.exit(1);
});
