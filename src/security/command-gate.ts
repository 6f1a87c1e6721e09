/**
 * Advisory deny-list for submitted commands. Catches a couple of well-known
 * footguns before anything is spawned; it is NOT a security boundary. Shell
 * syntax offers endless ways around any pattern list, so access control has to
 * live in front of the service (reverse proxy, network policy, OS user).
 */

/** Ordered; tested case-insensitively against the whitespace-normalized command. */
export const BLOCKED_COMMAND_PATTERNS: ReadonlyArray<RegExp> = [
  /^(sudo\s+)?rm\s+(-[a-z]*f[a-z]*\s+)?\/\s*$/i, // force-remove of /
  /^(sudo\s+)?ls\s+(-[a-z]*r[a-z]*)/i // recursive listing
];

export function normalizeCommand(command: string): string {
  return command.trim().replace(/\s+/g, " ");
}

/**
 * Returns a rejection reason naming the first matching pattern, or undefined
 * when the command may run.
 */
export function checkCommand(command: string): string | undefined {
  const normalized = normalizeCommand(command);
  const match = BLOCKED_COMMAND_PATTERNS.find((pattern) => pattern.test(normalized));
  if (!match) {
    return undefined;
  }
  return `Blocked: command matches dangerous pattern (${match.source})`;
}
