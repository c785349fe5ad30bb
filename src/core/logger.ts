type Level = "info" | "debug" | "warn" | "error";

const state = {
  debug: false,
  quiet: false,
};

export function configureLogger(opts: { debug?: boolean; quiet?: boolean }) {
  if (opts.debug !== undefined) state.debug = opts.debug;
  if (opts.quiet !== undefined) state.quiet = opts.quiet;
}

function tag(scope: string) {
  return `[reqforge][${scope}]`;
}

function log(level: Level, scope: string, ...args: unknown[]) {
  switch (level) {
    case "debug":
      console.debug(tag(scope), ...args);
      break;
    case "warn":
      console.warn(tag(scope), ...args);
      break;
    case "error":
      console.error(tag(scope), ...args);
      break;
    default:
      console.log(tag(scope), ...args);
  }
}

export function logInfo(scope: string, ...args: unknown[]) {
  if (state.quiet) return;
  log("info", scope, ...args);
}

/** Prints when `enabled` is set or the global debug switch is on. */
export function logDebug(enabled: boolean, scope: string, ...args: unknown[]) {
  if (!enabled && !state.debug) return;
  log("debug", scope, ...args);
}

export function logWarn(scope: string, ...args: unknown[]) {
  log("warn", scope, ...args);
}

export function logError(scope: string, ...args: unknown[]) {
  log("error", scope, ...args);
}
