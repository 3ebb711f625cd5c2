import { createInterface } from 'node:readline';

import type { Picker, PickerItem } from '../../core/src';

export interface ReadlinePickerOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/**
 * Numbered menu on the terminal. An answer may be the item number or its label;
 * anything else, or end of input, dismisses the picker.
 */
export function createReadlinePicker(options: ReadlinePickerOptions = {}): Picker {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stderr;

  return {
    async pick<T>(title: string, items: PickerItem<T>[]): Promise<T | undefined> {
      if (items.length === 0) {
        return undefined;
      }
      output.write(`${title}\n`);
      items.forEach((item, index) => {
        const detail = item.detail ? `  (${item.detail})` : '';
        output.write(`  ${index + 1}) ${item.label}${detail}\n`);
      });

      const answer = (await ask(input, output, `Choose 1-${items.length}: `)).trim();
      if (!answer) {
        return undefined;
      }
      if (/^\d+$/.test(answer)) {
        return items[Number.parseInt(answer, 10) - 1]?.value;
      }
      return items.find((item) => item.label === answer)?.value;
    },
  };
}

function ask(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
  question: string,
): Promise<string> {
  const rl = createInterface({ input, output, terminal: false });
  return new Promise((resolve) => {
    rl.once('close', () => resolve(''));
    rl.question(question, (answer) => {
      resolve(answer);
      rl.close();
    });
  });
}
