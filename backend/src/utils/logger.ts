export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

interface LoggerSettings {
  nodeEnv: string;
  level: LogLevel;
}

const settings: LoggerSettings = {
  nodeEnv: process.env.NODE_ENV ?? 'development',
  level: 'info',
};

/** Applied once at startup from the validated config. */
export function configureLogger(options: Partial<LoggerSettings>): void {
  Object.assign(settings, options);
}

function writeLine(stream: NodeJS.WriteStream, line: string): void {
  stream.write(`${line}\n`);
}

function output(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[settings.level]) {
    return;
  }

  const payload = {
    ts: new Date().toISOString(),
    level,
    message,
    ...(meta ?? {}),
  };

  if (settings.nodeEnv === 'production') {
    const line = JSON.stringify(payload);
    if (level === 'error' || level === 'warn') {
      writeLine(process.stderr, line);
    } else {
      writeLine(process.stdout, line);
    }
    return;
  }

  if (level === 'error') {
    console.error(`[${level.toUpperCase()}] ${message}`, meta ?? {});
  } else if (level === 'warn') {
    console.warn(`[${level.toUpperCase()}] ${message}`, meta ?? {});
  } else {
    writeLine(process.stdout, `[${level.toUpperCase()}] ${message} ${JSON.stringify(meta ?? {})}`);
  }
}

export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: settings.nodeEnv === 'development' ? error.stack : undefined,
    };
  }

  return {
    message: String(error),
  };
}

export const logger = {
  debug(message: string, meta?: Record<string, unknown>) {
    output('debug', message, meta);
  },
  info(message: string, meta?: Record<string, unknown>) {
    output('info', message, meta);
  },
  warn(message: string, meta?: Record<string, unknown>) {
    output('warn', message, meta);
  },
  error(message: string, meta?: Record<string, unknown>) {
    output('error', message, meta);
  },
};
