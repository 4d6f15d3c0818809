import type { LogSink } from '../types/options.js';

export const LOG_PREFIX = '[phrasemask]';

/** Default diagnostic sink: one prefixed line per message on stderr. */
export const stderrLog: LogSink = (message) => {
  process.stderr.write(`${LOG_PREFIX} ${message}\n`);
};

export const silentLog: LogSink = () => {};
