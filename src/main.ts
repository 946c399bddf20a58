/**
 * Command hub entry point
 * Runs the Telegram surface when BOT_TOKEN is set, otherwise reads commands from stdin
 */

import 'dotenv/config';
import { createHub } from './hub.js';
import { runConsole } from './console/surface.js';

async function main() {
  console.log('Command hub - Starting...');

  try {
    const hub = createHub();

    const shutdown = async () => {
      console.log('\nShutting down...');
      await hub.stop();
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());

    await hub.start();

    if (!hub.telegram) {
      await runConsole(hub.commands, { input: process.stdin, output: process.stdout });
      await hub.stop();
    }
  } catch (error) {
    console.error('Failed to start command hub:', error);
    process.exit(1);
  }
}

void main();
