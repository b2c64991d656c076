/**
 * Logger for vmconverge
 *
 * Supports human-readable and JSON output modes.
 */

import type { ConfigIssue, VmconvergeError } from '../core/errors.js';

/**
 * Output mode for the logger
 */
export type OutputMode = 'human' | 'json';

/**
 * JSON output structure for commands
 */
export interface JsonOutput {
  success: boolean;
  command?: string;
  data?: Record<string, unknown>;
  /** Every warning emitted during the command, in order */
  warnings: string[];
  error?: {
    code: string;
    message: string;
    suggestion?: string;
    details?: ConfigIssue[];
  };
}

/**
 * Logger class supporting human-readable and JSON output modes.
 *
 * Human mode outputs text with symbols.
 * JSON mode collects all output and emits a single JSON object at the end.
 * Warnings are buffered in both modes so callers can inspect them.
 */
export class Logger {
  private mode: OutputMode;
  private jsonBuffer: JsonOutput;
  private indentLevel: number = 0;
  private prefix: string = '';

  constructor(mode: OutputMode = 'human') {
    this.mode = mode;
    this.jsonBuffer = { success: true, warnings: [] };
  }

  /**
   * Get the current output mode.
   */
  getMode(): OutputMode {
    return this.mode;
  }

  /**
   * Prefix every following line with a machine name; null clears it.
   */
  setMachine(name: string | null): void {
    this.prefix = name ? `${name}: ` : '';
  }

  /**
   * Increase indent level for nested output.
   */
  indent(): void {
    this.indentLevel++;
  }

  /**
   * Decrease indent level.
   */
  dedent(): void {
    if (this.indentLevel > 0) {
      this.indentLevel--;
    }
  }

  private getIndent(): string {
    return '  '.repeat(this.indentLevel);
  }

  /**
   * Log a success message.
   */
  success(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}✓ ${this.prefix}${message}`);
    }
  }

  /**
   * Log an error message.
   */
  error(message: string, error?: VmconvergeError): void {
    if (this.mode === 'human') {
      console.error(`${this.getIndent()}✗ ${this.prefix}${message}`);
      if (error?.suggestion) {
        console.error(`${this.getIndent()}  Fix: ${error.suggestion}`);
      }
    } else {
      this.jsonBuffer.success = false;
      this.jsonBuffer.error = {
        code: error?.code ?? 'UNKNOWN',
        message,
        suggestion: error?.suggestion,
      };
    }
  }

  /**
   * Log configuration problems, one per line.
   */
  validationError(issues: ConfigIssue[]): void {
    if (this.mode === 'human') {
      console.error(`${this.getIndent()}✗ Configuration is invalid:`);
      for (const issue of issues) {
        console.error(`${this.getIndent()}  - ${issue.path}: ${issue.message}`);
      }
    } else {
      this.jsonBuffer.success = false;
      this.jsonBuffer.error = {
        code: 'CONFIG_VALIDATION_FAILED',
        message: 'Configuration is invalid',
        details: issues,
      };
    }
  }

  /**
   * Log an info message.
   */
  info(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}${this.prefix}${message}`);
    }
  }

  /**
   * Log a warning message.
   */
  warning(message: string): void {
    this.jsonBuffer.warnings.push(`${this.prefix}${message}`);
    if (this.mode === 'human') {
      console.warn(`${this.getIndent()}⚠ ${this.prefix}${message}`);
    }
  }

  /**
   * Log a remote operation being performed.
   */
  action(description: string, symbol: string = '→'): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}${symbol} ${this.prefix}${description}`);
    }
  }

  /**
   * Log a table of data.
   */
  table(headers: string[], rows: string[][]): void {
    if (this.mode === 'human') {
      // Calculate column widths
      const widths = headers.map((h, i) => {
        const maxRowWidth = Math.max(0, ...rows.map((r) => (r[i] ?? '').length));
        return Math.max(h.length, maxRowWidth);
      });

      const headerLine = headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join('  ');
      console.log(`${this.getIndent()}${headerLine}`);

      for (const row of rows) {
        const rowLine = row.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join('  ');
        console.log(`${this.getIndent()}${rowLine}`);
      }
    }
  }

  /**
   * Print a blank line.
   */
  newline(): void {
    if (this.mode === 'human') {
      console.log();
    }
  }

  /**
   * Set the command name for JSON output.
   */
  setCommand(command: string): void {
    this.jsonBuffer.command = command;
  }

  /**
   * Add data to the JSON output (merges with existing data).
   */
  addData(key: string, value: unknown): void {
    if (!this.jsonBuffer.data) {
      this.jsonBuffer.data = {};
    }
    this.jsonBuffer.data[key] = value;
  }

  /**
   * Set success status for JSON output.
   */
  setSuccess(success: boolean): void {
    this.jsonBuffer.success = success;
  }

  /**
   * Warnings emitted so far.
   */
  getWarnings(): readonly string[] {
    return this.jsonBuffer.warnings;
  }

  /**
   * Flush JSON output to stdout.
   *
   * Only does something in JSON mode.
   */
  flush(): void {
    if (this.mode === 'json') {
      console.log(JSON.stringify(this.jsonBuffer, null, 2));
    }
  }

  /**
   * Get the JSON buffer (for testing).
   */
  getJsonBuffer(): JsonOutput {
    return this.jsonBuffer;
  }

  /**
   * Create a logger from CLI options.
   */
  static fromOptions(options: { json?: boolean }): Logger {
    return new Logger(options.json ? 'json' : 'human');
  }
}
