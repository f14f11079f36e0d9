/**
 * POSIX shell quoting for forwarded arguments.
 *
 * Plain tokens (flags, numbers, paths) pass through untouched so the
 * generated command line reads the way it was typed. Anything else is
 * wrapped in single quotes, with embedded quotes written as '\''.
 */
const SAFE_CHARS = /^[a-zA-Z0-9_@%+=:,./-]+$/;

export function shellQuote(s: string): string {
  if (s === "") return "''";
  if (SAFE_CHARS.test(s)) return s;
  return "'" + s.replaceAll("'", "'\\''") + "'";
}

export function shellJoin(args: string[]): string {
  return args.map(shellQuote).join(" ");
}
