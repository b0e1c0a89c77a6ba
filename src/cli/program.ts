import { Command } from 'commander';
import log from 'loglevel';
import { analyze, assertStrongPassword, WeakPasswordError } from '../strength/analyzer.js';
import { DEFAULT_LOG_LEVEL, EXIT_INVALID_INPUT, EXIT_TOO_WEAK } from './const.js';
import { inquirerPrompt, resolvePassword, type PasswordPrompt } from './input.js';
import { parseSettings, type CheckSettings, type RawCliOptions } from './options.js';
import { formatJson, formatReport } from './report.js';

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * The report goes to stdout through `console.log`; `log` carries diagnostics
 * only, so `--log-level` never hides the result.
 */
export function buildProgram(prompt: PasswordPrompt = inquirerPrompt): Command {
  const program = new Command();
  program
    .name('pwcheck')
    .description('Heuristic password strength checker')
    .version('0.1.0')
    .argument('[password]', 'password to check (prompted with hidden input when omitted)')
    .option('--json', 'print the result as JSON')
    .option('--no-tips', 'leave the closing tips line out of the report')
    .option('--min-score <n>', 'exit with code 2 when the score is below n (0..10)')
    .option('--log-level <level>', 'trace, debug, info, warn, error or silent', DEFAULT_LOG_LEVEL)
    .action(async (argument: string | undefined, opts: RawCliOptions) => {
      let settings: CheckSettings;
      try {
        settings = parseSettings(opts);
      } catch (e) {
        log.error(errorMessage(e));
        process.exit(EXIT_INVALID_INPUT);
      }
      log.setLevel(settings.logLevel);

      let password: string;
      try {
        password = await resolvePassword(argument, prompt);
      } catch (e) {
        log.error('Could not read password:', errorMessage(e));
        process.exit(EXIT_INVALID_INPUT);
      }

      const analysis = analyze(password);
      const output = settings.json ? [formatJson(analysis)] : formatReport(analysis, { tips: settings.tips });
      output.forEach(line => console.log(line));

      if (settings.minScore === undefined) return;
      try {
        assertStrongPassword(password, settings.minScore);
      } catch (e) {
        if (!(e instanceof WeakPasswordError)) throw e;
        log.error(e.message);
        process.exit(EXIT_TOO_WEAK);
      }
    });
  return program;
}
