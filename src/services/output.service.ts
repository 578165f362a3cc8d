import chalk from "chalk";
import ora from "ora";
import type { IOutputService } from "../interfaces/output.interface";

type Spinner = ReturnType<typeof ora>;

/**
 * Terminal output with chalk colors and ora spinners.
 */
export class OutputService implements IOutputService {
  private spinner: Spinner | null = null;

  header(title: string, icon?: string): void {
    console.log(chalk.blue.bold(icon ? `${icon} ${title}` : title));
  }

  step(message: string): void {
    this.pauseSpinner();
    console.log(chalk.white.bold(message));
  }

  info(message: string): void {
    this.pauseSpinner();
    console.log(chalk.white(message));
  }

  success(message: string): void {
    this.pauseSpinner();
    console.log(chalk.green(`✓ ${message}`));
  }

  warn(message: string): void {
    this.pauseSpinner();
    console.log(chalk.yellow(`⚠ ${message}`));
  }

  error(message: string): void {
    this.pauseSpinner();
    console.error(chalk.red(`✗ ${message}`));
  }

  dim(message: string): void {
    this.pauseSpinner();
    console.log(chalk.gray(message));
  }

  newline(): void {
    console.log();
  }

  json(value: unknown): void {
    this.pauseSpinner();
    console.log(JSON.stringify(value, null, 2));
  }

  startSpinner(message: string): void {
    if (this.spinner) {
      this.spinner.text = message;
      return;
    }
    this.spinner = ora(message).start();
  }

  succeedSpinner(message?: string): void {
    this.spinner?.succeed(message);
    this.spinner = null;
  }

  failSpinner(message?: string): void {
    this.spinner?.fail(message);
    this.spinner = null;
  }

  stopSpinner(): void {
    this.spinner?.stop();
    this.spinner = null;
  }

  // A running spinner would overwrite lines printed underneath it.
  private pauseSpinner(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }
}
