/**
 * Interactive prompt for the service argument.
 */

import { createInterface } from 'node:readline/promises';
import type { ServiceName } from '../core/index.js';

export interface Prompter {
  question(query: string): Promise<string>;
}

/** Services offered interactively. `test` is not among them. */
export const PROMPT_SERVICES = ['expose', 'ngrok', 'custom'] as const satisfies readonly ServiceName[];

export const terminalPrompter: Prompter = {
  async question(query) {
    const prompt = createInterface({
      input: process.stdin,
      output: process.stderr,
    });
    try {
      return await prompt.question(query);
    } finally {
      prompt.close();
    }
  },
};

/**
 * Ask until the answer names one of PROMPT_SERVICES (or its number).
 * An empty answer picks `expose`.
 */
export async function promptForService(
  prompter: Prompter,
  write: (message: string) => void,
): Promise<ServiceName> {
  const choices = PROMPT_SERVICES.map((name, i) => `  ${i + 1}) ${name}`).join('\n');
  const query = `Please choose a service\n${choices}\nService [expose]: `;

  for (;;) {
    const answer = (await prompter.question(query)).trim().toLowerCase();
    if (answer === '') return 'expose';

    const byIndex = PROMPT_SERVICES[Number(answer) - 1];
    if (/^\d+$/.test(answer) && byIndex) return byIndex;

    const byName = PROMPT_SERVICES.find((name) => name === answer);
    if (byName) return byName;

    write('Please choose a valid service.\n');
  }
}
