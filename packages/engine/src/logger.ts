/**
 * Minimal structured logger for @rowscope/engine.
 *
 * Respects ROWSCOPE_LOG_LEVEL env var (debug | info | warn | error | silent).
 * Writes to stderr so stdout stays clean for report output.
 */

const LEVELS = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 } as const;
type Level = keyof typeof LEVELS;

function isLevel(raw: string): raw is Level {
  return Object.prototype.hasOwnProperty.call(LEVELS, raw);
}

function parseLevel(raw: string | undefined): number {
  if (!raw) return LEVELS.info;
  const key = raw.toLowerCase();
  return isLevel(key) ? LEVELS[key] : LEVELS.info;
}

// Read on every call: the CLI flips the level after this module is loaded.
function currentLevel(): number {
  return parseLevel(process.env.ROWSCOPE_LOG_LEVEL);
}

export const logger = {
  debug(msg: string) { if (currentLevel() <= LEVELS.debug) process.stderr.write(`[rowscope] ${msg}\n`); },
  info(msg: string)  { if (currentLevel() <= LEVELS.info)  process.stderr.write(`[rowscope] ${msg}\n`); },
  warn(msg: string)  { if (currentLevel() <= LEVELS.warn)  process.stderr.write(`[rowscope] ${msg}\n`); },
  error(msg: string) { if (currentLevel() <= LEVELS.error) process.stderr.write(`[rowscope] ${msg}\n`); },
};
