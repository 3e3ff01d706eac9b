import chalk from "chalk";

/**
 * Line sink used by the formatter; console.log / console.error by default.
 */
export type LineWriter = (line: string) => void;

export interface FormatterOptions {
  /** Disable styling (defaults to whether NO_COLOR is set) */
  noColor?: boolean;
  /** Receives standard output lines */
  out?: LineWriter;
  /** Receives error lines */
  err?: LineWriter;
}

/**
 * Formatter class for consistent CLI output formatting
 * Provides methods for colored output, tables, and progress indicators
 */
export class Formatter {
  private noColor: boolean;
  private out: LineWriter;
  private err: LineWriter;

  constructor(options: FormatterOptions = {}) {
    // Respect NO_COLOR environment variable
    this.noColor = options.noColor ?? process.env.NO_COLOR !== undefined;
    this.out = options.out ?? ((line) => console.log(line));
    this.err = options.err ?? ((line) => console.error(line));
  }

  /**
   * Display a success message with green checkmark
   */
  success(message: string): void {
    this.out(this.paint(`✓ ${message}`, chalk.green));
  }

  /**
   * Display an error message with red X
   */
  error(message: string): void {
    this.err(this.paint(`✗ ${message}`, chalk.red));
  }

  /**
   * Display an info message with blue indicator
   */
  info(message: string): void {
    this.out(this.paint(`ℹ ${message}`, chalk.blue));
  }

  /**
   * Display a warning message with yellow indicator
   */
  warning(message: string): void {
    this.out(this.paint(`⚠ ${message}`, chalk.yellow));
  }

  /**
   * Display a section header, underlined with `=`
   */
  header(message: string): void {
    this.out(this.paint(`\n${message}`, chalk.bold.cyan));
    this.out(this.paint("=".repeat(message.length), chalk.cyan));
  }

  subheader(message: string): void {
    this.out(this.paint(`\n${message}`, chalk.bold));
  }

  /**
   * Format and display a table
   * @param rows Array of row arrays [key, value] pairs
   * @param options Table formatting options
   */
  table(
    rows: Array<[string, string | number | boolean]>,
    options: { indent?: number; keyWidth?: number } = {}
  ): void {
    const indent = " ".repeat(options.indent ?? 2);
    const keyWidth = options.keyWidth ?? Math.max(0, ...rows.map(([k]) => k.length));

    for (const [key, value] of rows) {
      const paddedKey = this.paint(key.padEnd(keyWidth), chalk.dim);
      this.out(`${indent}${paddedKey}: ${String(value)}`);
    }
  }

  /**
   * Display a list with bullets
   */
  list(items: string[], options: { indent?: number; bullet?: string } = {}): void {
    const indent = " ".repeat(options.indent ?? 2);
    const bullet = options.bullet ?? "-";

    for (const item of items) {
      this.out(`${indent}${bullet} ${item}`);
    }
  }

  /**
   * Create a spinner for long-running operations (drawn on stderr)
   */
  spinner(message: string): Spinner {
    return new Spinner(message, this.noColor);
  }

  newline(): void {
    this.out("");
  }

  private paint(text: string, style: (text: string) => string): string {
    return this.noColor ? text : style(text);
  }
}

/**
 * Spinner class for displaying progress indicators
 */
export class Spinner {
  private frames = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
  private currentFrame = 0;
  private interval: NodeJS.Timeout | null = null;
  private message: string;
  private noColor: boolean;

  constructor(message: string, noColor: boolean) {
    this.message = message;
    this.noColor = noColor;
  }

  /**
   * Start the spinner animation. Does nothing when stderr is not a terminal.
   */
  start(): void {
    if (!process.stderr.isTTY) {
      return;
    }

    this.interval = setInterval(() => {
      const frame = this.frames[this.currentFrame] ?? "";
      this.currentFrame = (this.currentFrame + 1) % this.frames.length;
      process.stderr.write(`\r${this.noColor ? frame : chalk.cyan(frame)} ${this.message}`);
    }, 80);
  }

  /**
   * Stop the spinner and clear the line
   */
  stop(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
      process.stderr.write("\r" + " ".repeat(this.message.length + 3) + "\r");
    }
  }
}

/**
 * Default formatter instance for convenient usage
 */
export const formatter = new Formatter();
