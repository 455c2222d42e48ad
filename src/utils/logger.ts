export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  data?: Record<string, unknown>;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

class Logger {
  private minLevel: LogLevel;
  private jsonOutput: boolean;

  constructor() {
    const level = (process.env.LOG_LEVEL || 'info').toLowerCase();
    this.minLevel = isLogLevel(level) ? level : 'info';
    this.jsonOutput = process.env.NODE_ENV === 'production';
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  // One JSON object per line for log shippers; colored text otherwise
  setJsonOutput(enabled: boolean): void {
    this.jsonOutput = enabled;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.minLevel];
  }

  private log(level: LogLevel, component: string, message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component,
      message,
      ...(data && { data }),
    };

    const colors: Record<LogLevel, string> = {
      debug: '\x1b[36m', // cyan
      info: '\x1b[32m',  // green
      warn: '\x1b[33m',  // yellow
      error: '\x1b[31m', // red
    };
    const reset = '\x1b[0m';
    const write = level === 'error' ? console.error : console.log;

    if (this.jsonOutput) {
      write(JSON.stringify(entry));
    } else {
      const dataStr = data ? ` ${JSON.stringify(data)}` : '';
      write(`${colors[level]}[${entry.timestamp}] [${level.toUpperCase()}] [${component}] ${message}${dataStr}${reset}`);
    }
  }

  debug(component: string, message: string, data?: Record<string, unknown>): void {
    this.log('debug', component, message, data);
  }

  info(component: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', component, message, data);
  }

  warn(component: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', component, message, data);
  }

  error(component: string, message: string, data?: Record<string, unknown>): void {
    this.log('error', component, message, data);
  }

  api(method: string, endpoint: string, status: number, latencyMs: number, data?: Record<string, unknown>): void {
    this.info('API', `${method} ${endpoint}`, { status, latencyMs, ...data, type: 'API_CALL' });
  }

  audit(action: string, user: string, data?: Record<string, unknown>): void {
    this.info('Audit', action, { user, ...data, type: 'AUDIT' });
  }
}

export const logger = new Logger();
