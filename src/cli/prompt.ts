import readline from 'readline';
import { Writable } from 'stream';
import { InvalidOptionError } from '../utils/errors';

export interface PromptStreams {
  input: NodeJS.ReadableStream & { isTTY?: boolean };
  output: NodeJS.WritableStream;
}

/**
 * Ask for a secret on the terminal without echoing what is typed.
 * The prompt goes to stderr so stdout only carries reports.
 *
 * Rejects when stdin is not a terminal, or closes before an answer arrives.
 */
export async function promptPassword(
  message: string,
  streams: PromptStreams = { input: process.stdin, output: process.stderr }
): Promise<string> {
  if (!streams.input.isTTY) {
    throw new InvalidOptionError('--password', 'stdin is not a terminal');
  }

  let muted = false;

  const output = new Writable({
    write(chunk, encoding, callback) {
      if (!muted) {
        streams.output.write(chunk, encoding);
      }
      callback();
    },
  });

  const rl = readline.createInterface({
    input: streams.input,
    output,
    terminal: true,
  });

  try {
    const answer = await new Promise<string>((resolve, reject) => {
      let answered = false;

      rl.once('close', () => {
        if (!answered) {
          reject(new InvalidOptionError('--password', 'no input'));
        }
      });

      rl.question(message, value => {
        answered = true;
        resolve(value);
      });
      muted = true;
    });

    streams.output.write('\n');
    return answer;
  } finally {
    rl.close();
  }
}
