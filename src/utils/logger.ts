export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

export type LogLevelName = keyof typeof LogLevel;

export class Logger {
  private static levelName: LogLevelName = 'INFO';

  private static get level(): LogLevel {
    return LogLevel[this.levelName];
  }

  /**
   * Set the process-wide log level. Called once at startup from the loaded config.
   */
  static setLevel(level: LogLevelName): void {
    this.levelName = level;
  }

  static getLevel(): LogLevelName {
    return this.levelName;
  }

  private static formatTime(): string {
    const now = new Date();
    return now.toTimeString().split(' ')[0]; // HH:MM:SS
  }

  static info(message: string, ...args: unknown[]) {
    if (this.level >= LogLevel.INFO) {
      console.log(`${this.formatTime()} [INFO] ${message}`, ...args);
    }
  }

  static warn(message: string, ...args: unknown[]) {
    if (this.level >= LogLevel.WARN) {
      console.warn(`${this.formatTime()} [WARN] ${message}`, ...args);
    }
  }

  static error(message: string, ...args: unknown[]) {
    console.error(`${this.formatTime()} [ERROR] ${message}`, ...args);
  }

  static debug(message: string, ...args: unknown[]) {
    if (this.level >= LogLevel.DEBUG) {
      console.log(`${this.formatTime()} [DEBUG] ${message}`, ...args);
    }
  }
}
