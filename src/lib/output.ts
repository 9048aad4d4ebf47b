import chalk from "chalk";

export interface OutputOptions {
  verbose: boolean;
}

export class Output {
  private verbose: boolean;
  private startTime: number;

  constructor(options: OutputOptions) {
    this.verbose = options.verbose;
    this.startTime = Date.now();
  }

  // Progress notes, verbose only
  info(msg: string): void {
    if (this.verbose) {
      console.log(chalk.cyan("●") + " " + chalk.cyan(msg));
    }
  }

  success(msg: string): void {
    console.log(chalk.green("✓") + " " + chalk.green(msg));
  }

  warn(msg: string): void {
    console.log(chalk.yellow("⚠") + " " + chalk.yellow(msg));
  }

  error(msg: string): void {
    console.log(chalk.red("✗") + " " + chalk.red(msg));
  }

  // Section header
  header(title: string): void {
    console.log();
    console.log(chalk.blue(`━━━ ${title} ━━━`));
  }

  // Aligned "Label:  value" row
  field(label: string, value: string | number): void {
    console.log(chalk.white(`${label}:`.padEnd(20)) + String(value));
  }

  // Plain lines, e.g. a rendered tree or report
  lines(text: string | string[]): void {
    for (const line of Array.isArray(text) ? text : text.split("\n")) {
      console.log(line);
    }
  }

  // Diagnostic line echoed to the console in verbose mode
  diagnostic(line: string): void {
    if (this.verbose) {
      console.log(chalk.dim(line));
    }
  }

  // Progress counter, verbose only
  progress(label: string, done: number, total?: number): void {
    if (this.verbose) {
      const count = total === undefined ? `${done}` : `${done}/${total}`;
      console.log(chalk.magenta(`   ⤷ ${label}: ${count}`));
    }
  }

  // Final summary
  summary(msg: string): void {
    const elapsed = ((Date.now() - this.startTime) / 1000).toFixed(1);
    console.log();
    console.log(chalk.white(`${msg} in ${elapsed}s.`));
  }
}
