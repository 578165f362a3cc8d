/**
 * Prompt Service Interface
 *
 * Blocking terminal questions. Both methods resolve to the trimmed answer,
 * which may be empty.
 */
export interface IPromptService {
  input(message: string): Promise<string>;
  secret(message: string): Promise<string>;
  /** Whether a terminal is attached to answer questions. */
  isInteractive(): boolean;
}
