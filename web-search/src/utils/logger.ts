import chalk from "chalk";

/** Log levels */
export type LogLevel = "debug" | "info" | "warn" | "error";

/** Logger configuration */
interface LoggerConfig {
  debugEnabled: boolean;
}

/** Header names whose values never reach the log */
const SECRET_HEADERS = new Set(["authorization", "proxy-authorization"]);

/** Query parameters whose values never reach the log */
const SECRET_PARAMS = /([?&](?:oauth_signature|oauth_consumer_key)=)[^&]*/g;

class Logger {
  private config: LoggerConfig = {
    debugEnabled: false,
  };

  /** Enable or disable debug logging */
  setDebug(enabled: boolean): void {
    this.config.debugEnabled = enabled;
  }

  /** Check if debug is enabled */
  isDebugEnabled(): boolean {
    return this.config.debugEnabled;
  }

  /** Log debug message (only if debug enabled) */
  debug(message: string, ...args: unknown[]): void {
    if (this.config.debugEnabled) {
      console.log(chalk.gray(`[DEBUG] ${message}`), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    console.log(chalk.blue(`[INFO] ${message}`), ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`[WARN] ${message}`), ...args);
  }

  error(message: string, ...args: unknown[]): void {
    console.error(chalk.red(`[ERROR] ${message}`), ...args);
  }

  success(message: string, ...args: unknown[]): void {
    console.log(chalk.green(`[SUCCESS] ${message}`), ...args);
  }

  /**
   * Log a curl command for an API request (debug only).
   * Credentials in headers and signed query strings are redacted.
   */
  logCurl(
    method: string,
    url: string,
    headers?: Readonly<Record<string, string>>
  ): void {
    if (!this.config.debugEnabled) return;

    let curl = `curl -X ${method} '${redactUrl(url)}'`;

    if (headers) {
      for (const [key, value] of Object.entries(headers)) {
        const shown = SECRET_HEADERS.has(key.toLowerCase()) ? "<redacted>" : value;
        curl += ` \\\n  -H '${key}: ${shown}'`;
      }
    }

    this.debug(`API Call:\n${curl}`);
  }
}

/**
 * Replace signature and consumer key values in a query string.
 */
export function redactUrl(url: string): string {
  return url.replace(SECRET_PARAMS, "$1<redacted>");
}

/** Global logger instance */
export const logger = new Logger();
