const MASK = '****';

/**
 * Renders a command line for the log with every secret value replaced by a mask.
 * Arguments containing spaces are quoted so the line can be copied into a shell.
 */
export function formatCommand(executable: string, args: string[], secrets: string[] = []): string {
  const masked = args.map((arg) =>
    secrets.reduce((current, secret) => (secret ? current.split(secret).join(MASK) : current), arg),
  );
  return [executable, ...masked].map((part) => (part.includes(' ') ? `"${part}"` : part)).join(' ');
}
