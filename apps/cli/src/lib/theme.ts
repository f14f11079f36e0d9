import chalk from "chalk";

export const theme = {
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  info: chalk.blue,
  muted: chalk.gray,
  accent: chalk.cyan,
  emphasis: chalk.bold,
} as const;

export function formatDetail(label: string, value: string): string {
  return theme.muted(`  ${label}: ${value}`);
}

/**
 * Print a command failure the same way from every command:
 * a JSON object in --json mode, a red message otherwise.
 */
export function reportError(error: unknown, json?: boolean): void {
  const message = error instanceof Error ? error.message : String(error);
  if (json) {
    console.log(JSON.stringify({ error: message }));
  } else {
    console.error(theme.error(`\nError: ${message}`));
  }
}
