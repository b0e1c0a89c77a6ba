import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { analyze } from '../strength/analyzer.js';
import { EXIT_INVALID_INPUT, EXIT_TOO_WEAK } from './const.js';
import type { PasswordPrompt } from './input.js';
import { buildProgram } from './program.js';
import { formatReport } from './report.js';

class ExitCalled extends Error {
  constructor(readonly code: string | number | null | undefined) {
    super(`process.exit(${code})`);
  }
}

function run(args: string[], prompt?: PasswordPrompt): Promise<unknown> {
  return buildProgram(prompt).parseAsync(args, { from: 'user' });
}

describe('pwcheck program', () => {
  let logSpy: MockInstance<typeof console.log>;
  let exitSpy: MockInstance<typeof process.exit>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    exitSpy = vi.spyOn(process, 'exit').mockImplementation((code?: string | number | null) => {
      throw new ExitCalled(code);
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function printed(): string[] {
    return logSpy.mock.calls.map(call => String(call[0]));
  }

  it('prints the text report and exits normally', async () => {
    await run(['Kumari@2025!']);
    expect(printed()).toEqual(formatReport(analyze('Kumari@2025!')));
    expect(exitSpy).not.toHaveBeenCalled();
  });

  it.each(['warn', 'error', 'silent'])('still prints the report at log level %s', async level => {
    await run(['Kumari@2025!', '--log-level', level]);
    expect(printed()).toContain('Score         : 8/10 (Strong)');
  });

  it('prints JSON with --json', async () => {
    await run(['Kumari@2025!', '--json', '--log-level', 'silent']);
    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(printed()[0])).toMatchObject({ score: 8, tier: 'Strong', entropyBits: 78.7, length: 12 });
  });

  it('drops the tips line with --no-tips', async () => {
    await run(['Kumari@2025!', '--no-tips', '--log-level', 'silent']);
    expect(printed()).toEqual(formatReport(analyze('Kumari@2025!'), { tips: false }));
  });

  it('exits with code 2 after the report when the score is below --min-score', async () => {
    await expect(run(['Kumari@2025!', '--min-score', '9', '--log-level', 'silent'])).rejects.toThrow(ExitCalled);
    expect(exitSpy).toHaveBeenCalledWith(EXIT_TOO_WEAK);
    expect(printed()).toContain('Score         : 8/10 (Strong)');
  });

  it('exits normally when the score meets --min-score', async () => {
    await run(['Kumari@2025!', '--min-score', '8', '--log-level', 'silent']);
    expect(exitSpy).not.toHaveBeenCalled();
  });

  it.each([
    ['--min-score', '11'],
    ['--log-level', 'loud'],
  ])('exits with code 1 on %s %s', async (flag, value) => {
    await expect(run(['Kumari@2025!', flag, value])).rejects.toThrow(ExitCalled);
    expect(exitSpy).toHaveBeenCalledWith(EXIT_INVALID_INPUT);
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('prompts when no password argument is given', async () => {
    const prompt: PasswordPrompt = { askHidden: vi.fn(async () => 'qwer') };
    await run(['--log-level', 'silent'], prompt);
    expect(prompt.askHidden).toHaveBeenCalledTimes(1);
    expect(printed()).toContain('Score         : 0/10 (Very Weak)');
  });

  it('exits with code 1 when the prompt fails', async () => {
    const prompt: PasswordPrompt = { askHidden: vi.fn(async () => { throw new Error('closed'); }) };
    await expect(run(['--log-level', 'silent'], prompt)).rejects.toThrow(ExitCalled);
    expect(exitSpy).toHaveBeenCalledWith(EXIT_INVALID_INPUT);
  });
});
