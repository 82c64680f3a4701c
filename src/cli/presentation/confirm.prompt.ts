import { Injectable } from '@nestjs/common';
import { createInterface } from 'node:readline/promises';
import { stdin, stdout } from 'node:process';

export interface PromptStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/**
 * Raised when input ends before the question is answered,
 * e.g. stdin redirected from /dev/null without --yes.
 */
export class ConfirmationUnavailableError extends Error {
  constructor() {
    super('Input ended before the confirmation was answered. Pass --yes to skip the prompt.');
    this.name = 'ConfirmationUnavailableError';
  }
}

/**
 * Yes/no question on the terminal. Anything but y/yes counts as no.
 */
@Injectable()
export class ConfirmPrompt {
  async confirm(question: string, streams: PromptStreams = { input: stdin, output: stdout }): Promise<boolean> {
    const rl = createInterface({ input: streams.input, output: streams.output });
    try {
      return await new Promise<boolean>((resolve, reject) => {
        // Settles first when input ends; the pending question never would
        rl.once('close', () => reject(new ConfirmationUnavailableError()));
        rl.question(`${question} [y/N]: `).then((answer) => resolve(isAffirmative(answer)), reject);
      });
    } finally {
      rl.close();
    }
  }
}

export function isAffirmative(answer: string): boolean {
  return ['y', 'yes'].includes(answer.trim().toLowerCase());
}
