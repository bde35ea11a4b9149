export type Logger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string, err?: unknown) => void;
};

/** Console logger whose lines carry a `[subsystem]` prefix. */
export function createConsoleLogger(subsystem: string): Logger {
  const prefix = `[${subsystem}]`;
  return {
    info: (message) => console.log(`${prefix} ${message}`),
    warn: (message) => console.warn(`${prefix} ${message}`),
    error: (message, err) => {
      if (err === undefined) {
        console.error(`${prefix} ${message}`);
      } else {
        console.error(`${prefix} ${message}:`, err instanceof Error ? err.message : String(err));
      }
    },
  };
}

/** Logger that keeps its lines, for tests and quiet runs. */
export function createMemoryLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    info: (message) => lines.push(`info ${message}`),
    warn: (message) => lines.push(`warn ${message}`),
    error: (message, err) =>
      lines.push(
        err === undefined
          ? `error ${message}`
          : `error ${message}: ${err instanceof Error ? err.message : String(err)}`,
      ),
  };
}
