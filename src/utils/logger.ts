import pc from 'picocolors';

type LogLevel = 'info' | 'warn' | 'error' | 'success' | 'dim';

const icons: Record<LogLevel, string> = {
  info: pc.blue('ℹ'),
  warn: pc.yellow('⚠'),
  error: pc.red('✖'),
  success: pc.green('✔'),
  dim: pc.gray('•'),
};

function formatMessage(level: LogLevel, message: string): string {
  return `${icons[level]} ${message}`;
}

/** Diagnostics go to stderr so stdout carries only the report. */
export const logger = {
  info: (message: string): void => {
    console.error(formatMessage('info', message));
  },
  warn: (message: string): void => {
    console.error(formatMessage('warn', message));
  },
  error: (message: string): void => {
    console.error(formatMessage('error', pc.red(message)));
  },
  success: (message: string): void => {
    console.error(formatMessage('success', message));
  },
  dim: (message: string): void => {
    console.error(formatMessage('dim', pc.gray(message)));
  },
};
