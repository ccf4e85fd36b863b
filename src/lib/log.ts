import { loadConfig } from './config';

export type Logger = {
  debug: (...a: unknown[]) => void;
  warn: (...a: unknown[]) => void;
  error: (...a: unknown[]) => void;
};

let debugEnabled: boolean | undefined;

const isDebug = () => {
  if (debugEnabled === undefined) {
    try {
      debugEnabled = loadConfig().debug;
    } catch (e) {
      console.warn('[log] config unreadable, debug output off:', e);
      debugEnabled = false;
    }
  }
  return debugEnabled;
};

/** Forces debug output on or off; `undefined` re-reads the environment. */
export const setDebugLogging = (on: boolean | undefined) => {
  debugEnabled = on;
};

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: (...a) => {
      if (isDebug()) console.log(prefix, ...a);
    },
    warn: (...a) => console.warn(prefix, ...a),
    error: (...a) => console.error(prefix, ...a),
  };
}
