/**
 * Output Service Interface
 *
 * Terminal output used by commands and the onboarding flow. The default
 * implementation writes with chalk and ora; tests record the calls.
 */
export interface IOutputService {
  header(title: string, icon?: string): void;
  step(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  dim(message: string): void;
  newline(): void;
  /** Pretty-print a value as JSON (manual registration payloads) */
  json(value: unknown): void;
  startSpinner(message: string): void;
  succeedSpinner(message?: string): void;
  failSpinner(message?: string): void;
  stopSpinner(): void;
}
