/**
 * Supports Command
 *
 * mdbook asks `supports <renderer>` before running the preprocessor;
 * exit status 0 means yes. Every renderer is supported.
 */

export function supportsCommand(_renderer: string): void {
  process.exitCode = 0;
}
