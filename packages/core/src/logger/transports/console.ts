import { LOG_LEVEL_COLORS, type LogEntry, type LogTransport } from "../types.js";

const RESET = "\x1b[0m";

/**
 * Options for ConsoleTransport.
 */
export interface ConsoleTransportOptions {
  /** Force colors on or off. Auto-detects if not specified. */
  colors?: boolean;
  /** Output sinks, for tests */
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
}

/**
 * Detect if colors should be enabled by default.
 * Disables colors when:
 * - NO_COLOR environment variable is set
 * - CI environment variable is set
 * - stdout is not a TTY
 */
function shouldEnableColors(): boolean {
  if (process.env.NO_COLOR !== undefined) {
    return false;
  }
  if (process.env.CI) {
    return false;
  }
  return process.stdout.isTTY === true;
}

/**
 * Console transport with color support.
 * error and fatal go to stderr, everything else to stdout.
 */
export class ConsoleTransport implements LogTransport {
  private readonly useColors: boolean;
  private readonly stdout: (line: string) => void;
  private readonly stderr: (line: string) => void;

  constructor(options: ConsoleTransportOptions = {}) {
    this.useColors = options.colors ?? shouldEnableColors();
    this.stdout = options.stdout ?? ((line) => console.log(line));
    this.stderr = options.stderr ?? ((line) => console.error(line));
  }

  log(entry: LogEntry): void {
    const level = entry.level.toUpperCase().padEnd(5);
    const tag = this.useColors ? `${LOG_LEVEL_COLORS[entry.level]}[${level}]${RESET}` : `[${level}]`;

    let output = `${tag} ${entry.message}`;

    if (entry.data !== undefined) {
      const dataStr = typeof entry.data === "string" ? entry.data : JSON.stringify(entry.data);
      output += ` ${dataStr}`;
    }

    if (entry.level === "error" || entry.level === "fatal") {
      this.stderr(output);
    } else {
      this.stdout(output);
    }
  }
}
