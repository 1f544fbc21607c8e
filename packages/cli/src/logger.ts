import chalk from "chalk";
import type { Ora } from "ora";
import type { TopologyLogCallback } from "@netstack/topology";

const STEP_LINE = /^\[\d+\/\d+\]/;

export interface ConsoleLoggerOptions {
  /** Step lines also become the spinner's text */
  spinner?: Ora;
  /** Send every line to stderr, keeping stdout for machine-readable output */
  stderrOnly?: boolean;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): TopologyLogCallback {
  return (line, stream = "stdout") => {
    const { spinner } = options;
    const isStep = STEP_LINE.test(line);
    if (spinner && isStep) spinner.text = line;

    const text = stream === "stderr" ? chalk.yellow(line) : isStep ? chalk.blue(line) : line;
    const write = stream === "stderr" || options.stderrOnly ? console.error : console.log;

    if (spinner?.isSpinning) {
      spinner.clear();
      write(text);
      spinner.render();
    } else {
      write(text);
    }
  };
}
