/**
 * Output Channels
 *
 * Line-oriented log sinks. The application writes to the console; tests
 * capture lines in memory.
 */

/**
 * Minimal line sink.
 */
export interface OutputChannel {
  appendLine(line: string): void;
}

/**
 * Channel that writes each line to the console.
 */
export function createConsoleChannel(name: string): OutputChannel {
  return {
    appendLine(line: string) {
      console.log(`[${name}] ${line}`);
    }
  };
}

/**
 * Channel that keeps every line for later inspection.
 */
export class MemoryChannel implements OutputChannel {
  readonly lines: string[] = [];

  appendLine(line: string): void {
    this.lines.push(line);
  }
}

/**
 * Time of day as HH:MM:SS.mmm.
 */
export function timestamp(date: Date = new Date()): string {
  return date.toISOString().split('T')[1].slice(0, -1);
}

/**
 * Tagged logger over an output channel.
 *
 * Lines look like `12:00:00.000 [warn] [dispatcher] message`.
 */
export class TaskLog {
  constructor(
    private readonly channel: OutputChannel,
    private readonly tag: string
  ) {}

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string): void {
    this.write('error', message);
  }

  private write(level: 'info' | 'warn' | 'error', message: string): void {
    this.channel.appendLine(`${timestamp()} [${level}] [${this.tag}] ${message}`);
  }
}
