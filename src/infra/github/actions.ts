/**
 * GitHub Actions workflow commands
 */

/**
 * Ask the runner to mask `value` in all later log output.
 * Must be written before anything that could echo the value.
 */
export function announceSecret(value: string, write: (line: string) => void = (line) => process.stdout.write(line)): void {
  if (!value) return;
  write(`::add-mask::${value}\n`);
}
