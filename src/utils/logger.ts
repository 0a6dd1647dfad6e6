export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

export function consoleLogger(options: { verbose?: boolean } = {}): Logger {
  const stamp = () => new Date().toISOString();
  return {
    debug: (msg) => {
      if (options.verbose) console.log(`[${stamp()}] debug ${msg}`);
    },
    info: (msg) => console.log(`[${stamp()}] ${msg}`),
    warn: (msg) => console.warn(`[${stamp()}] warn ${msg}`),
    error: (msg) => console.error(`[${stamp()}] error ${msg}`),
  };
}

/** Collects lines in memory; used by the proof scripts. */
export function memoryLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    debug: (msg) => lines.push(`debug ${msg}`),
    info: (msg) => lines.push(`info ${msg}`),
    warn: (msg) => lines.push(`warn ${msg}`),
    error: (msg) => lines.push(`error ${msg}`),
  };
}
