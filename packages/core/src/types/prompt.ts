/**
 * Prompting seam
 *
 * Interactive components ask questions through this interface; the CLI
 * backs it with readline, tests back it with scripted answers.
 */
export interface Prompter {
  ask(question: string): Promise<string>;
  /** Informational line shown to the user between questions */
  say(message: string): void;
}
