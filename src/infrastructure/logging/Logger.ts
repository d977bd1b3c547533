export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * ロガーのインターフェース
 *
 * エディター層が拒否された操作や切断された接続を報告するのに使います。
 * ドメイン層はログを出しません。
 */
export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * console に出力するロガーを作成
 *
 * level より低いレベルのメッセージは捨てられます。
 */
export function createConsoleLogger(level: LogLevel = 'warn', target: Console = console): Logger {
  const enabled = (messageLevel: Exclude<LogLevel, 'silent'>) =>
    LEVEL_ORDER[messageLevel] >= LEVEL_ORDER[level];

  return {
    debug(message, ...details) {
      if (enabled('debug')) target.debug(message, ...details);
    },
    info(message, ...details) {
      if (enabled('info')) target.info(message, ...details);
    },
    warn(message, ...details) {
      if (enabled('warn')) target.warn(message, ...details);
    },
    error(message, ...details) {
      if (enabled('error')) target.error(message, ...details);
    },
  };
}

export const silentLogger: Logger = createConsoleLogger('silent');
