export interface Logger {
  debug(message: string): void;
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export class ConsoleLogger implements Logger {
  constructor(private verbose = false) {}

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  debug(message: string): void {
    if (this.verbose) {
      console.debug(message);
    }
  }

  log(message: string): void {
    console.log(message);
  }

  warn(message: string): void {
    console.warn(message);
  }

  error(message: string): void {
    console.error(message);
  }
}

export const defaultLogger = new ConsoleLogger();
