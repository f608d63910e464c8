/**
 * Manual code entry for `xferctl login --no-local-server`.
 */

import * as readline from 'node:readline/promises';

import { CancelledError, InvalidArgumentError } from '@xferctl/kernel';

export async function promptForCode(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
  signal?: AbortSignal,
): Promise<string> {
  const rl = readline.createInterface({ input, output, terminal: false });
  const closed = new Promise<never>((_, reject) => {
    rl.once('close', () => reject(new CancelledError('Input closed before an authorization code was entered.')));
  });
  let answer: string;
  try {
    answer = await Promise.race([
      rl.question('Enter the authorization code: ', signal !== undefined ? { signal } : {}),
      closed,
    ]);
  } catch (err) {
    if (signal?.aborted === true) {
      throw new CancelledError('Login cancelled.', { cause: err });
    }
    throw err;
  } finally {
    rl.close();
  }

  const code = answer.trim();
  if (code === '') {
    throw new InvalidArgumentError('No authorization code entered.');
  }
  return code;
}
