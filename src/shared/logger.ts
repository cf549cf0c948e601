export type LogSink = (message: string) => void;

export class Logger {
  constructor(
    private isVerbose: boolean,
    private sink: LogSink = (message) => console.log(message)
  ) {}

  get verboseEnabled(): boolean {
    return this.isVerbose;
  }

  log(message: string): void {
    this.sink(message);
  }

  verbose(message: string): void {
    if (this.isVerbose) {
      this.sink(message);
    }
  }

  error(message: string, error?: unknown): void {
    if (error instanceof Error) {
      console.error(message, error.message);
      if (this.isVerbose && error.stack) {
        console.error(error.stack);
      }
    } else if (error !== undefined) {
      console.error(message, String(error));
    } else {
      console.error(message);
    }
  }
}
