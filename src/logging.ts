export const COLOR = {
  reset: "\x1b[0m",
  gray: (s: string) => `\x1b[90m${s}${COLOR.reset}`,
  cyan: (s: string) => `\x1b[36m${s}${COLOR.reset}`,
  green: (s: string) => `\x1b[32m${s}${COLOR.reset}`,
  yellow: (s: string) => `\x1b[33m${s}${COLOR.reset}`,
  magenta: (s: string) => `\x1b[35m${s}${COLOR.reset}`,
  red: (s: string) => `\x1b[31m${s}${COLOR.reset}`,
};

export const fmtMs = (ms: number) => `${Math.round(ms)}ms`;

export type StepEvent =
  | { kind: "start"; step: string; mode: string }
  | { kind: "fit"; step: string; ms: number }
  | { kind: "model_loaded"; step: string; path: string }
  | { kind: "model_persisted"; step: string; path: string }
  | { kind: "cache_hit"; step: string; runId: string }
  | { kind: "output_loaded"; step: string; path: string }
  | { kind: "output_persisted"; step: string; path: string }
  | { kind: "done"; step: string; ms: number };

export interface Logger {
  step(event: StepEvent): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

export interface LoggerOptions {
  quiet?: boolean;
  logSteps?: boolean;
  logCache?: boolean;
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const quiet = opts.quiet ?? false;
  const logSteps = !quiet && (opts.logSteps ?? true);
  const logCache = !quiet && (opts.logCache ?? false);

  return {
    step(e) {
      switch (e.kind) {
        case "start":
          if (logSteps) console.log(`${COLOR.cyan("▶ step")} ${e.step} ${COLOR.gray(`(${e.mode})`)}`);
          break;
        case "fit":
          if (logSteps) console.log(COLOR.magenta(`  fitted ${e.step} ${COLOR.gray("(" + fmtMs(e.ms) + ")")}`));
          break;
        case "done":
          if (logSteps) console.log(`${COLOR.green("✓ done")} ${e.step} ${COLOR.gray("(" + fmtMs(e.ms) + ")")}`);
          break;
        case "cache_hit":
          if (logCache) console.log(COLOR.yellow(`  ${e.step}: cached output [run ${e.runId}]`));
          break;
        case "model_loaded":
        case "model_persisted":
        case "output_loaded":
        case "output_persisted":
          if (logCache) console.log(COLOR.gray(`  ${e.step}: ${e.kind.replace("_", " ")} ${e.path}`));
          break;
      }
    },
    info(msg) {
      if (!quiet) console.log(msg);
    },
    warn(msg) {
      if (!quiet) console.warn(COLOR.yellow(`[warn] ${msg}`));
    },
    error(msg) {
      console.error(COLOR.red(`[error] ${msg}`));
    }
  };
}

export const silentLogger: Logger = {
  step() {},
  info() {},
  warn() {},
  error() {}
};
