// Everything goes to stderr: stdout is reserved for the JSON dump.
export class Logger {
  static debugMode = false;

  static log(...args: unknown[]) {
    if (Logger.debugMode) {
      console.error(...args);
    }
  }

  static warn(...args: unknown[]) {
    console.error('⚠️ ', ...args);
  }

  static enableDebug() {
    Logger.debugMode = true;
  }

  static disableDebug() {
    Logger.debugMode = false;
  }
}
