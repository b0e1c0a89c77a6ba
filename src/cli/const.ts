export const EXIT_INVALID_INPUT = 1;
export const EXIT_TOO_WEAK = 2;

export const PROMPT_MESSAGE = 'Enter a password to check (input hidden)';
export const PROMPT_MASK = '*';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const;
export const DEFAULT_LOG_LEVEL = 'info';

export const REPORT_TITLE = 'Password Check';
export const REPORT_TIP = "Tips: Use 3-4 random words plus symbols (e.g. 'river*planet*violet*42'). Avoid personal info and patterns.";
export const ENTROPY_DECIMALS = 1;
