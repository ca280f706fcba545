import ora, { type Ora } from 'ora';

/** Progress for a long-running command. Always written to stderr. */
export interface Spinner {
  start(): Spinner;
  stop(): Spinner;
  succeed(message?: string): Spinner;
  fail(message?: string): Spinner;
  update(message: string): Spinner;
}

// One line per status change
class LineSpinner implements Spinner {
  private text: string;
  private readonly write: (line: string) => void;

  constructor(text: string, write: (line: string) => void) {
    this.text = text;
    this.write = write;
  }

  start(): Spinner {
    this.write(this.text);
    return this;
  }

  stop(): Spinner {
    return this;
  }

  succeed(message?: string): Spinner {
    if (message) {
      this.write(`✓ ${message}`);
    }
    return this;
  }

  fail(message?: string): Spinner {
    if (message) {
      this.write(`✗ ${message}`);
    }
    return this;
  }

  update(message: string): Spinner {
    if (message !== this.text) {
      this.text = message;
      this.write(message);
    }
    return this;
  }
}

class OraSpinner implements Spinner {
  private readonly spinner: Ora;

  constructor(spinner: Ora) {
    this.spinner = spinner;
  }

  start(): Spinner {
    this.spinner.start();
    return this;
  }

  stop(): Spinner {
    this.spinner.stop();
    return this;
  }

  succeed(message?: string): Spinner {
    this.spinner.succeed(message);
    return this;
  }

  fail(message?: string): Spinner {
    this.spinner.fail(message);
    return this;
  }

  update(message: string): Spinner {
    this.spinner.text = message;
    return this;
  }
}

export interface SpinnerOptions {
  /** Force the plain-line spinner regardless of the terminal */
  plain?: boolean;
  /** Line writer for the plain spinner (default: stderr) */
  write?: (line: string) => void;
}

/** ora on an interactive stderr, plain lines otherwise */
export function createSpinner(text: string, options: SpinnerOptions = {}): Spinner {
  if (!options.plain && process.stderr.isTTY) {
    return new OraSpinner(ora({ text, color: 'cyan', stream: process.stderr }));
  }
  return new LineSpinner(text, options.write ?? (line => process.stderr.write(`${line}\n`)));
}
