// eslint-disable-next-line @typescript-eslint/no-require-imports
import chalk = require('chalk');

export type LogLevel = 'debug' | 'info' | 'warning' | 'error';

/**
 * Receives every line that passes the verbosity filter
 */
export type LogSink = (level: LogLevel, message: string) => void;

const COLORS: Record<LogLevel, (s: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warning: chalk.yellow,
  error: chalk.red,
};

const stderrSink: LogSink = (level, message) => {
  process.stderr.write(COLORS[level](message) + '\n');
};

let sink = stderrSink;

let verbose = false;

let startTime = Date.now();

export function setVerbose(v: boolean) {
  verbose = v;
}

/**
 * Redirect log output; call without arguments to go back to stderr
 */
export function setLogSink(s?: LogSink) {
  sink = s ?? stderrSink;
}

export function debug(s: string) {
  if (verbose) {
    sink('debug', `[${pad(6, elapsedTime())}] ${s}`);
  }
}

export function info(s: string) {
  sink('info', s);
}

export function warning(s: string) {
  sink('warning', s);
}

export function error(s: string) {
  sink('error', s);
}

export function markStartTime() {
  startTime = Date.now();
}

function elapsedTime() {
  const elapsedS = (Date.now() - startTime) / 1000.0;
  return elapsedS.toFixed(1);
}

function pad(n: number, x: string, p: string = ' ') {
  return p.repeat(Math.max(n - x.length, 0)) + x;
}
