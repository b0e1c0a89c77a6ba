import { describe, expect, it, vi } from 'vitest';
import { PROMPT_MESSAGE } from './const.js';
import { resolvePassword, type PasswordPrompt } from './input.js';

function fakePrompt(answer: string): PasswordPrompt {
  return { askHidden: vi.fn(async () => answer) };
}

describe('resolvePassword', () => {
  it('uses the positional argument without prompting', async () => {
    const prompt = fakePrompt('unused');
    await expect(resolvePassword('test-secret', prompt)).resolves.toBe('test-secret');
    expect(prompt.askHidden).not.toHaveBeenCalled();
  });

  it('keeps an empty argument as an empty password', async () => {
    const prompt = fakePrompt('unused');
    await expect(resolvePassword('', prompt)).resolves.toBe('');
    expect(prompt.askHidden).not.toHaveBeenCalled();
  });

  it('prompts when no argument is given', async () => {
    const prompt = fakePrompt('typed-secret');
    await expect(resolvePassword(undefined, prompt)).resolves.toBe('typed-secret');
    expect(prompt.askHidden).toHaveBeenCalledWith(PROMPT_MESSAGE);
  });
});
