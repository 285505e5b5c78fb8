export type Mode = "run" | "rest" | "mcp";

export interface CliArgs {
  mode: Mode;
  limit?: number;
  dataset?: string;
}

function argValue(argv: readonly string[], flag: string): string | undefined {
  const idx = argv.indexOf(flag);
  if (idx !== -1 && argv[idx + 1]) return argv[idx + 1];
  return undefined;
}

/** `--mode run|rest|mcp` (default run), `--limit N`, `--dataset PATH` */
export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { mode: "run" };

  const mode = argValue(argv, "--mode")?.toLowerCase();
  if (mode === "run" || mode === "rest" || mode === "mcp") args.mode = mode;
  else if (mode !== undefined) throw new Error(`Unknown mode "${mode}" (expected run, rest or mcp)`);

  const limit = argValue(argv, "--limit");
  if (limit !== undefined) {
    const n = Number(limit);
    if (!Number.isInteger(n) || n < 0) throw new Error(`--limit must be a non-negative integer, got "${limit}"`);
    args.limit = n;
  }

  const dataset = argValue(argv, "--dataset");
  if (dataset !== undefined) args.dataset = dataset;
  return args;
}
