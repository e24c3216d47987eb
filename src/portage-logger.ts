/**
 * Portage Logger
 *
 * Timestamped console logging shared by the executor and the portage runner.
 * Every line is also kept in an in-memory buffer so a portage result can carry
 * its own log, whatever the console verbosity was.
 */

/**
 * Process-wide run flags. Passed explicitly to every component that needs them.
 */
export interface RunMode {
  quiet: boolean;
  debug: boolean;
  dryRun: boolean;
}

/**
 * Where log lines end up. `console` satisfies this.
 */
export interface LogSink {
  log(message: string): void;
  error(message: string): void;
}

export class PortageLogger {
  private mode: RunMode;
  private sink: LogSink;
  private now: () => Date;
  private buffer: string[] = [];

  constructor(mode: RunMode, sink: LogSink = console, now: () => Date = () => new Date()) {
    this.mode = mode;
    this.sink = sink;
    this.now = now;
  }

  /**
   * Progress output, silenced by quiet mode.
   */
  info(message: string): void {
    const line = this.format(message);
    this.buffer.push(line);
    if (!this.mode.quiet) {
      this.sink.log(line);
    }
  }

  /**
   * Detail only shown with --debug.
   */
  debug(message: string): void {
    const line = this.format(`🔍 ${message}`);
    this.buffer.push(line);
    if (this.mode.debug && !this.mode.quiet) {
      this.sink.log(line);
    }
  }

  /**
   * Echo of a command line. Always printed: in dry-run mode it is the output.
   */
  command(rendered: string): void {
    const line = this.format(`$ ${rendered}`);
    this.buffer.push(line);
    this.sink.log(line);
  }

  error(message: string, error?: unknown): void {
    const detail = error === undefined ? '' : `: ${error instanceof Error ? error.message : String(error)}`;
    const line = this.format(`❌ ${message}${detail}`);
    this.buffer.push(line);
    this.sink.error(line);
  }

  /**
   * Position in the buffer, for slicing out the lines of one portage later.
   */
  mark(): number {
    return this.buffer.length;
  }

  linesSince(mark: number): string[] {
    return this.buffer.slice(mark);
  }

  private format(message: string): string {
    return `[${this.now().toISOString()}] ${message}`;
  }
}
