/** Minimal `--name=value` / `--flag` parsing for the maintenance scripts. */
export class CliArgs {
  constructor(private args: string[] = process.argv.slice(2)) {}

  has(flag: string): boolean {
    return this.args.includes(`--${flag}`);
  }

  get(name: string): string | undefined {
    const prefix = `--${name}=`;
    const found = this.args.find((arg) => arg.startsWith(prefix));
    if (found) return found.slice(prefix.length);

    // Also accept "--name value"
    const index = this.args.indexOf(`--${name}`);
    const next = index >= 0 ? this.args[index + 1] : undefined;
    return next !== undefined && !next.startsWith('--') ? next : undefined;
  }

  getNumber(name: string, defaultValue: number): number {
    const raw = this.get(name);
    if (raw === undefined) return defaultValue;
    const parsed = Number(raw);
    if (!Number.isFinite(parsed) || parsed < 0) {
      throw new Error(`--${name} must be a non-negative number, got "${raw}"`);
    }
    return parsed;
  }
}
