import inquirer from 'inquirer';
import { PROMPT_MASK, PROMPT_MESSAGE } from './const.js';

export interface PasswordPrompt {
  askHidden(message: string): Promise<string>;
}

export const inquirerPrompt: PasswordPrompt = {
  async askHidden(message: string): Promise<string> {
    const { password } = await inquirer.prompt<{ password: string }>([
      { type: 'password', name: 'password', message, mask: PROMPT_MASK }
    ]);
    return password;
  }
};

/** A positional argument wins, even when empty; otherwise ask with hidden input. */
export async function resolvePassword(argument: string | undefined, prompt: PasswordPrompt): Promise<string> {
  if (argument !== undefined) return argument;
  return prompt.askHidden(PROMPT_MESSAGE);
}
