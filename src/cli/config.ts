import { BUNDLED_BANNED_LIST, BUNDLED_WEAK_LIST, ENV_BANNED_LIST, ENV_LOG_FILE, ENV_WEAK_LIST } from './const.js';

/** Global options as commander hands them over; `false` comes from a `--no-*` flag. */
export type CliOptions = {
  weakList?: string | false;
  bannedList?: string | false;
  logFile?: string;
  export?: string;
  verbose?: boolean;
};

export interface CheckerConfig {
  weakWordlistPath?: string;
  bannedWordlistPath?: string;
  logFile?: string;
  exportPath?: string;
  verbose: boolean;
}

function pickList(option: string | false | undefined, fromEnv: string | undefined, bundled: string): string | undefined {
  if (option === false) return undefined;
  return option || fromEnv || bundled;
}

export function resolveConfig(opts: CliOptions, env: NodeJS.ProcessEnv = process.env): CheckerConfig {
  return {
    weakWordlistPath: pickList(opts.weakList, env[ENV_WEAK_LIST], BUNDLED_WEAK_LIST),
    bannedWordlistPath: pickList(opts.bannedList, env[ENV_BANNED_LIST], BUNDLED_BANNED_LIST),
    logFile: opts.logFile || env[ENV_LOG_FILE] || undefined,
    exportPath: opts.export || undefined,
    verbose: !!opts.verbose,
  };
}
