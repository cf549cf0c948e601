import { DebugParseEntry } from '../types';

/**
 * Interface for debug output operations
 * This allows the application layer to remain independent of specific debug implementations
 */
export interface IDebugWriter {
  /**
   * Add the trace of one parse call
   */
  addParseEntry(entry: DebugParseEntry): void;

  /**
   * Write all accumulated debug entries to files
   */
  writeAll(): void;
}
