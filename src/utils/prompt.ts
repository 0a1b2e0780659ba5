import { createInterface } from 'readline';
import type { Readable, Writable } from 'stream';

export interface PromptStreams {
  input: Readable;
  output: Writable;
}

const AFFIRMATIVE = /^y(es)?$/i;

/**
 * Ask a y/N question. Anything but `y`/`yes`, including end of input, is a no.
 */
export async function promptForConfirmation(
  message: string,
  streams: PromptStreams = { input: process.stdin, output: process.stdout },
): Promise<boolean> {
  const rl = createInterface({ input: streams.input, output: streams.output });

  const answer = await new Promise<string>((resolve) => {
    rl.once('close', () => resolve(''));
    rl.question(`${message} (y/N): `, resolve);
  });
  rl.close();

  return AFFIRMATIVE.test(answer.trim());
}
