import * as fs from 'fs';
import * as path from 'path';

import { IDebugWriter } from '../domain/interfaces';
import { DebugParseEntry } from '../domain/types';
import { Logger } from '../shared/logger';

export class DebugWriter implements IDebugWriter {
  private entries: DebugParseEntry[] = [];
  private logger: Logger;
  private debugDir: string;

  constructor(logger: Logger, debugDir = 'debug') {
    this.logger = logger;
    this.debugDir = debugDir;
  }

  addParseEntry(entry: DebugParseEntry): void {
    this.entries.push(entry);
  }

  get entryCount(): number {
    return this.entries.length;
  }

  writeAll(): void {
    if (!fs.existsSync(this.debugDir)) {
      fs.mkdirSync(this.debugDir, { recursive: true });
    }
    this.writeParseTrace();
    this.logger.log(`Debug files written to ${this.debugDir}/ directory`);
  }

  private writeParseTrace(): void {
    const filename = path.join(this.debugDir, 'parse_trace.json');
    const data = {
      step: 'Parse',
      description: 'Tokens, parse tree and values for every parsed input',
      total_entries: this.entries.length,
      result_counts: {
        parsed: this.entries.filter((e) => e.error === undefined && e.values.length > 0).length,
        empty: this.entries.filter((e) => e.error === undefined && e.values.length === 0).length,
        failed: this.entries.filter((e) => e.error !== undefined).length,
      },
      unknown_text: this.countUnknownText(),
      entries: this.entries,
    };
    fs.writeFileSync(filename, JSON.stringify(data, null, 2));
  }

  private countUnknownText(): Record<string, number> {
    const counts: Record<string, number> = {};
    this.entries
      .flatMap((e) => e.unknown)
      .forEach((text) => {
        counts[text] = (counts[text] || 0) + 1;
      });
    return counts;
  }
}
