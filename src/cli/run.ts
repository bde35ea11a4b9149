import type { MetadataReader } from "../catalog/exif-extract.js";
import type { CatalogProgressEvent, CatalogRunSummary } from "../catalog/types.js";
import type { Logger } from "../logging/logger.js";
import { cleanupGallery } from "../catalog/cleanup-gallery.js";
import { runCatalog } from "../catalog/run-catalog.js";
import { runGallery } from "../catalog/run-gallery.js";
import { ConfigError, loadCatalogConfig } from "../config/config.js";
import { createConsoleLogger } from "../logging/logger.js";
import { openCatalogDatabase } from "../store/executor.js";
import { parseCatalogArgs, USAGE } from "./args.js";
import { formatCleanupSummary, formatProgressEvent } from "./progress.js";

export type CliDeps = {
  reader?: MetadataReader;
  logger?: Logger;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
};

/**
 * CLI entry point. Returns the process exit code: 0 on success, 1 for
 * usage or configuration errors and for runs where a batch could not be
 * written.
 */
export async function main(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  deps: CliDeps = {},
): Promise<number> {
  const stdout = deps.stdout ?? ((line: string) => console.log(line));
  const stderr = deps.stderr ?? ((line: string) => console.error(line));
  const logger = deps.logger ?? createConsoleLogger("catalog");

  const parsed = parseCatalogArgs(argv);
  if (!parsed.ok) {
    stderr(`error: ${parsed.error}`);
    stderr(USAGE);
    return 1;
  }
  const { command } = parsed;
  if (command.kind === "help") {
    stdout(USAGE);
    return 0;
  }

  let summary: CatalogRunSummary;
  try {
    const config = loadCatalogConfig(env);
    const onProgress = (event: CatalogProgressEvent) => {
      const line = formatProgressEvent(event);
      if (line) {
        stdout(line);
      }
    };
    const database = openCatalogDatabase(config.dbPath);
    try {
      if (command.kind === "cleanup") {
        const cleanup = await cleanupGallery(
          {
            doneDir: command.doneDir,
            urlMapPath: command.urlMapPath ?? config.urlMapPath ?? undefined,
          },
          { db: database.executor, logger },
        );
        stdout(formatCleanupSummary(cleanup));
        return 0;
      }
      const batchSize = command.batchSize ?? config.batchSize;
      const pipelineDeps = { db: database.executor, reader: deps.reader, logger };
      summary =
        command.kind === "scan"
          ? await runCatalog(
              {
                root: command.root,
                refresh: command.refresh,
                targets: command.files,
                batchSize,
                precedence: config.precedence,
              },
              pipelineDeps,
              onProgress,
            )
          : await runGallery(
              {
                doneDir: command.doneDir,
                urlMapPath: command.urlMapPath ?? config.urlMapPath ?? undefined,
                refresh: command.refresh,
                specificFiles: command.files,
                batchSize,
                precedence: config.precedence,
              },
              pipelineDeps,
              onProgress,
            );
    } finally {
      database.close();
    }
  } catch (err) {
    if (err instanceof ConfigError) {
      stderr(`config error: ${err.message}`);
      return 1;
    }
    logger.error("run failed", err);
    return 1;
  }

  return summary.batches_failed > 0 ? 1 : 0;
}
