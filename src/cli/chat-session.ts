/**
 * Interactive chat loop over any pair of streams.
 *
 * Prompts "You: ", answers "Recipe Finder: ...". Ends on quit/exit, EOF or Ctrl-C.
 * Turns run one at a time in arrival order; a failing turn is reported and the
 * loop keeps going.
 */

import * as readline from 'readline';
import { logger, type Logger } from '../lib/logger/structured-logger.js';
import { formatRecommendation } from '../services/recipes/format/recipe-formatter.js';
import { SPECIAL_MESSAGES, type Recommender } from '../services/recipes/recommender.service.js';

export const QUIT_COMMANDS: ReadonlySet<string> = new Set(['quit', 'exit']);

export const BANNER = "RECIPE FINDER\nType 'quit' to exit.\n";

export interface ChatIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  /** Treat the streams as a TTY (echo, Ctrl-C handling); defaults to false */
  terminal?: boolean;
}

export function runChat(recommender: Recommender, io: ChatIO, log: Logger = logger): Promise<void> {
  return new Promise(resolve => {
    const rl = readline.createInterface({
      input: io.input,
      output: io.output,
      terminal: io.terminal ?? false,
    });

    let closed = false;
    let saidGoodbye = false;
    let turns: Promise<void> = Promise.resolve();

    const say = (text: string): void => {
      io.output.write(`Recipe Finder: ${text}\n`);
    };

    const farewell = (): void => {
      if (saidGoodbye) return;
      saidGoodbye = true;
      say(SPECIAL_MESSAGES.goodbye);
    };

    const prompt = (): void => {
      if (!closed) rl.prompt();
    };

    const handleLine = async (line: string): Promise<void> => {
      const query = line.trim();
      if (saidGoodbye) return;
      if (!query) {
        prompt();
        return;
      }
      if (QUIT_COMMANDS.has(query.toLowerCase())) {
        farewell();
        rl.close();
        return;
      }

      try {
        const result = await recommender.recommend(query);
        say(formatRecommendation(result));
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        log.error({ event: 'chat_turn_failed', error: message }, '[CHAT] Turn failed');
        io.output.write(`Error: ${message}. Please try again.\n`);
      }
      prompt();
    };

    io.output.write(BANNER);
    rl.setPrompt('You: ');
    rl.prompt();

    rl.on('line', line => {
      turns = turns.then(() => handleLine(line));
    });
    rl.on('SIGINT', () => rl.close());
    rl.on('close', () => {
      closed = true;
      resolve(turns.then(farewell));
    });
  });
}
