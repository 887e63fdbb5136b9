import type { Logger } from "./types.js";

export class ConsoleLogger implements Logger {
  private readonly prefix: string;
  private readonly verbose: boolean;

  constructor(name: string, verbose = process.env.LOG_LEVEL === "debug") {
    this.prefix = `[${name}]`;
    this.verbose = verbose;
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    if (!this.verbose) return;
    console.debug(`${this.prefix} ${msg}${format(data)}`);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    console.log(`${this.prefix} ${msg}${format(data)}`);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    console.warn(`${this.prefix} ⚠ ${msg}${format(data)}`);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    console.error(`${this.prefix} ✗ ${msg}${format(data)}`);
  }
}

function format(data: Record<string, unknown> | undefined): string {
  return data ? ` ${JSON.stringify(data)}` : "";
}

export function createLogger(name: string): Logger {
  return new ConsoleLogger(name);
}
