import * as readline from 'readline';

/**
 * Calls `handleLine` for every line of `input` until it ends. Blank lines are
 * skipped. Rejects, and stops reading, if the handler throws.
 *
 * @returns Promise that resolves once the input is closed
 */
export async function forEachInputLine(
  handleLine: (line: string) => void,
  input: NodeJS.ReadableStream = process.stdin
): Promise<void> {
  const rl = readline.createInterface({ input, terminal: false });

  return new Promise((resolve, reject) => {
    rl.on('line', (line: string) => {
      if (line.trim() === '') return;
      try {
        handleLine(line);
      } catch (error) {
        rl.close();
        reject(error);
      }
    });
    rl.on('close', () => resolve());
  });
}
