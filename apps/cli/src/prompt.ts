/**
 * Interactive overwrite confirmation
 */

import { createInterface } from 'node:readline/promises';

export type ConfirmOverwrite = (path: string) => Promise<boolean>;

/**
 * Ask on the terminal before replacing an existing file. Anything but yes declines.
 */
export async function promptOverwrite(path: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });

  try {
    const answer = await rl.question(`${path} already exists. Overwrite? [y/N] `);
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}
