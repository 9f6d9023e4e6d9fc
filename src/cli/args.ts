/** Argument parsing for the peerweave CLI. */

export interface CliArgs {
  command: string | undefined;
  /** Positional arguments after the command. */
  positional: string[];
  /** `--name value` pairs; a flag with no value maps to "true". */
  flags: Record<string, string | undefined>;
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const [command, ...rest] = argv;
  const positional: string[] = [];
  const flags: Record<string, string | undefined> = {};

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (!arg.startsWith("--")) {
      positional.push(arg);
      continue;
    }
    const eq = arg.indexOf("=");
    if (eq !== -1) {
      flags[arg.slice(2, eq)] = arg.slice(eq + 1);
      continue;
    }
    const next = rest[i + 1];
    if (next !== undefined && !next.startsWith("--")) {
      flags[arg.slice(2)] = next;
      i++;
    } else {
      flags[arg.slice(2)] = "true";
    }
  }

  return { command, positional, flags };
}
