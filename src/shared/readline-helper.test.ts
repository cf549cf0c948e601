import { Readable } from 'stream';

import { describe, expect, it } from 'vitest';

import { forEachInputLine } from './readline-helper';

describe('forEachInputLine', () => {
  it('hands over every non-blank line', async () => {
    const lines: string[] = [];
    await forEachInputLine((line) => lines.push(line), Readable.from(['noon\n', '\n', '  \n', 'tomorrow at 5\n']));
    expect(lines).toEqual(['noon', 'tomorrow at 5']);
  });

  it('rejects when the handler throws', async () => {
    const input = Readable.from(['noon\n', 'later\n']);
    await expect(
      forEachInputLine(() => {
        throw new Error('cannot parse');
      }, input)
    ).rejects.toThrow('cannot parse');
  });
});
