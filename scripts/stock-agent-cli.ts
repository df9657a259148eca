import 'dotenv/config';
import { createInterface } from 'node:readline/promises';
import { stdin, stdout } from 'node:process';

import { createStockAgentSystem } from '../src/mastra';
import { HELP_TEXT, handleLine } from '../src/mastra/cli/commands';
import { errorMessage } from '../src/mastra/errors';

async function main() {
  console.log('Initializing Stock Analysis Agent System...');
  console.log('='.repeat(50));

  const system = createStockAgentSystem();
  const sessionId = system.startSession();
  const rl = createInterface({ input: stdin, output: stdout });

  // Ctrl+C cancels the running query; at the prompt it exits
  let inFlight: AbortController | undefined;
  rl.on('SIGINT', () => {
    if (inFlight) {
      inFlight.abort();
      return;
    }
    rl.close();
  });

  console.log('INTERACTIVE MODE');
  console.log("Type 'help' for commands, 'quit' to exit");
  console.log(HELP_TEXT);

  try {
    while (true) {
      let line: string;
      try {
        line = await rl.question('\nEnter your query: ');
      } catch {
        // readline rejects pending questions once closed
        break;
      }

      inFlight = new AbortController();
      try {
        const outcome = await handleLine(line, {
          system,
          sessionId,
          print: (text) => console.log(text),
          signal: inFlight.signal,
        });
        if (outcome === 'quit') break;
      } catch (error) {
        console.error(`Error: ${errorMessage(error)}`);
      } finally {
        inFlight = undefined;
      }
    }
  } finally {
    system.endSession(sessionId);
    rl.close();
  }
}

main().catch((error: unknown) => {
  console.error('Fatal:', errorMessage(error));
  process.exit(1);
});
