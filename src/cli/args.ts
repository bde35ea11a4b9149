export type CatalogCommand =
  | {
      kind: "scan";
      root: string;
      refresh: boolean;
      files: string[];
      batchSize: number | null;
    }
  | {
      kind: "gallery";
      doneDir: string;
      urlMapPath: string | null;
      refresh: boolean;
      files: string[];
      batchSize: number | null;
    }
  | { kind: "cleanup"; doneDir: string; urlMapPath: string | null }
  | { kind: "help" };

export type ParseArgsResult = { ok: true; command: CatalogCommand } | { ok: false; error: string };

export const USAGE = [
  "Usage:",
  "  photo-catalog scan <dir> [--refresh] [--file <path>]... [--batch-size N]",
  "  photo-catalog gallery <done-dir> [--urls <file>] [--refresh] [--file <name>]... [--batch-size N]",
  "  photo-catalog cleanup <done-dir> [--urls <file>]",
  "",
  "Environment:",
  "  PHOTO_CATALOG_DB          SQLite database path (required; DATABASE_URL also accepted)",
  "  PHOTO_CATALOG_BATCH_SIZE  rows per upsert transaction (default 500)",
  "  PHOTO_CATALOG_CONFIG      JSON config file with batch_size, precedence, url_map",
  "  PHOTO_CATALOG_URL_MAP     URL mapping file for gallery runs",
].join("\n");

/**
 * Parse `process.argv`-style arguments (the first two entries are the node
 * binary and the script).
 */
export function parseCatalogArgs(argv: readonly string[]): ParseArgsResult {
  const args = argv.slice(2);
  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    return { ok: true, command: { kind: "help" } };
  }

  const [subcommand, ...rest] = args;
  if (subcommand !== "scan" && subcommand !== "gallery" && subcommand !== "cleanup") {
    return { ok: false, error: `unknown command "${subcommand}"` };
  }

  const positional: string[] = [];
  const files: string[] = [];
  let refresh = false;
  let batchSize: number | null = null;
  let urlMapPath: string | null = null;

  for (let i = 0; i < rest.length; i += 1) {
    const arg = rest[i];
    const next = rest[i + 1];
    switch (arg) {
      case "--refresh":
      case "-r":
        refresh = true;
        break;
      case "--file":
      case "-f":
        if (!next || next.startsWith("-")) {
          return { ok: false, error: `${arg} requires a value` };
        }
        files.push(next);
        i += 1;
        break;
      case "--batch-size": {
        if (!next) {
          return { ok: false, error: "--batch-size requires a value" };
        }
        const parsed = Number(next);
        if (!/^\d+$/.test(next) || !Number.isSafeInteger(parsed) || parsed <= 0) {
          return { ok: false, error: `--batch-size must be a positive integer, got "${next}"` };
        }
        batchSize = parsed;
        i += 1;
        break;
      }
      case "--urls":
        if (subcommand === "scan") {
          return { ok: false, error: "--urls is only valid for gallery and cleanup" };
        }
        if (!next || next.startsWith("-")) {
          return { ok: false, error: "--urls requires a value" };
        }
        urlMapPath = next;
        i += 1;
        break;
      default:
        if (arg.startsWith("-")) {
          return { ok: false, error: `unknown option ${arg}` };
        }
        positional.push(arg);
    }
  }

  if (positional.length !== 1) {
    return {
      ok: false,
      error:
        positional.length === 0
          ? `${subcommand} requires a directory`
          : `unexpected argument ${positional[1]}`,
    };
  }

  if (subcommand === "cleanup") {
    if (refresh || files.length > 0 || batchSize !== null) {
      return { ok: false, error: "cleanup only takes a directory and --urls" };
    }
    return { ok: true, command: { kind: "cleanup", doneDir: positional[0], urlMapPath } };
  }
  if (subcommand === "scan") {
    return { ok: true, command: { kind: "scan", root: positional[0], refresh, files, batchSize } };
  }
  return {
    ok: true,
    command: { kind: "gallery", doneDir: positional[0], urlMapPath, refresh, files, batchSize },
  };
}
