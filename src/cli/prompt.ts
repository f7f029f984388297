/**
 * Terminal prompts. Secret entry is echo-free.
 */

import { createInterface } from "node:readline/promises";
import { Writable } from "node:stream";

export async function ask(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return (await rl.question(question)).trim();
  } finally {
    rl.close();
  }
}

export async function askSecret(question: string): Promise<string> {
  let muted = false;
  const output = new Writable({
    write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
      if (!muted) {
        process.stdout.write(chunk);
      }
      callback();
    },
  });

  const rl = createInterface({ input: process.stdin, output, terminal: true });
  process.stdout.write(question);
  muted = true;
  try {
    return await rl.question("");
  } finally {
    muted = false;
    rl.close();
    process.stdout.write("\n");
  }
}

export async function confirm(question: string): Promise<boolean> {
  const answer = await ask(`${question} [y/N] `);
  return /^y(es)?$/i.test(answer);
}
