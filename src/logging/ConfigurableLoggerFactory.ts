import { createLogger, format, transports } from 'winston';
import type { Format, TransformableInfo } from 'logform';
import DailyRotateFile from 'winston-daily-rotate-file';
import type * as Transport from 'winston-transport';
import type { Logger, LoggerFactory } from 'global-logger-factory';
import { WinstonLogger } from 'global-logger-factory';
import { logContext } from './LogContext';

export interface ConfigurableLoggerOptions {
  fileName?: string;
  maxSize?: string;
  maxFiles?: string;
  /** Disable the rotating file transport (console only). */
  console?: boolean;
}

export class ConfigurableLoggerFactory implements LoggerFactory {
  private readonly level: string;
  private readonly fileTransport?: DailyRotateFile;

  public constructor(level: string, options: ConfigurableLoggerOptions = {}) {
    this.level = level;
    if (!options.console) {
      this.fileTransport = new DailyRotateFile({
        filename: options.fileName || './logs/game-stack-%DATE%.log',
        datePattern: 'YYYY-MM-DD',
        maxSize: options.maxSize || '10m',
        maxFiles: options.maxFiles || '14d',
      });
      // Shared across every logger
      this.fileTransport.setMaxListeners(Infinity);
    }
  }

  public createLogger(label: string): Logger {
    return new WinstonLogger(createLogger({
      level: this.level,
      format: this.getFormat(label),
      transports: this.createTransports(label),
    }));
  }

  protected createTransports(label: string): Transport[] {
    const consoleTransport = new transports.Console({
      format: format.combine(
        format.colorize(),
        this.getFormat(label),
      ),
    });
    return this.fileTransport ? [ consoleTransport, this.fileTransport ] : [ consoleTransport ];
  }

  protected getFormat(label: string): Format {
    return format.combine(
      format.label({ label }),
      format.timestamp(),
      format((info) => {
        const store = logContext.getStore();
        if (store) {
          info.runId = store.runId;
          if (store.service) {
            info.service = store.service;
          }
        }
        return info;
      })(),
      format.printf(
        ({ level: levelInner, message, label: labelInner, timestamp, runId, service }: TransformableInfo): string => {
          const runInfo = typeof runId === 'string' ? ` [Run:${runId}]` : '';
          const serviceInfo = typeof service === 'string' ? ` (${service})` : '';
          const className = typeof labelInner === 'string' ? labelInner.split('/').pop() : undefined;
          return `${timestamp}${runInfo} [${className ?? label}]${serviceInfo} ${levelInner}: ${message}`;
        },
      ),
    );
  }
}
