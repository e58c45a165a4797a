/**
 * Spinner wrapper that respects quiet/JSON mode.
 */

import ora, { type Ora } from "ora";
import { isQuietMode, isJsonMode } from "./cli-context.js";
import { getOutputMode, type OutputMode } from "./output/mode.js";

export interface Spinner {
  start(text?: string): Spinner;
  stop(): Spinner;
  succeed(text?: string): Spinner;
  fail(text?: string): Spinner;
  text: string;
}

/**
 * No-op spinner for quiet/JSON mode.
 */
export class SilentSpinner implements Spinner {
  text = "";

  start(text?: string): Spinner {
    if (text) this.text = text;
    return this;
  }

  stop(): Spinner {
    return this;
  }

  succeed(_text?: string): Spinner {
    return this;
  }

  fail(_text?: string): Spinner {
    return this;
  }
}

class OraSpinner implements Spinner {
  private ora: Ora;

  constructor(text?: string) {
    // Progress goes to stderr so stdout stays clean for results
    this.ora = ora({ text, stream: process.stderr });
  }

  get text(): string {
    return this.ora.text;
  }

  set text(value: string) {
    this.ora.text = value;
  }

  start(text?: string): Spinner {
    this.ora.start(text);
    return this;
  }

  stop(): Spinner {
    this.ora.stop();
    return this;
  }

  succeed(text?: string): Spinner {
    this.ora.succeed(text);
    return this;
  }

  fail(text?: string): Spinner {
    this.ora.fail(text);
    return this;
  }
}

/**
 * Create a spinner that respects quiet/JSON mode. Only an interactive
 * terminal gets an animated spinner; CI logs and pipes stay plain.
 */
export function createSpinner(text?: string, mode: OutputMode = getOutputMode()): Spinner {
  if (isQuietMode() || isJsonMode() || mode !== "tty") {
    return new SilentSpinner();
  }
  return new OraSpinner(text);
}
