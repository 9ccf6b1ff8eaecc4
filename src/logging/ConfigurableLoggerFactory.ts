import { createLogger, format, transports } from 'winston';
import type { Format, TransformableInfo } from 'logform';
import DailyRotateFile from 'winston-daily-rotate-file';
import type * as Transport from 'winston-transport';
import type { Logger, LoggerFactory } from 'global-logger-factory';
import { WinstonLogger } from 'global-logger-factory';
import { logContext } from './LogContext';

export interface ConfigurableLoggerOptions {
  /** Daily rotated file pattern, e.g. `./logs/server-%DATE%.log`. No file output when omitted. */
  fileName?: string;
  maxSize?: string;
  maxFiles?: string;
  showLocation?: boolean;
}

export class ConfigurableLoggerFactory implements LoggerFactory {
  private readonly level: string;
  private readonly showLocation: boolean;
  private readonly fileTransport?: DailyRotateFile;

  public constructor(level: string, options: ConfigurableLoggerOptions = {}) {
    this.level = level;
    this.showLocation = options.showLocation ?? false;
    if (options.fileName) {
      this.fileTransport = new DailyRotateFile({
        filename: options.fileName,
        datePattern: 'YYYY-MM-DD',
        maxSize: options.maxSize ?? '10m',
        maxFiles: options.maxFiles ?? '14d',
      });
      // Shared by every logger the factory creates
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
    const list: Transport[] = [
      new transports.Console({
        format: format.combine(
          format.colorize(),
          this.getFormat(label),
        ),
      }),
    ];
    if (this.fileTransport) {
      list.push(this.fileTransport);
    }
    return list;
  }

  protected getFormat(label: string): Format {
    return format.combine(
      format.label({ label }),
      format.timestamp(),
      format((info) => {
        const store = logContext.getStore();
        if (store?.requestId) {
          info.requestId = store.requestId;
        }
        return info;
      })(),
      format.printf(
        ({ level: levelInner, message, label: labelInner, timestamp, requestId }: TransformableInfo): string => {
          const requestInfo = typeof requestId === 'string' ? ` [Req:${requestId}]` : '';
          return `${String(timestamp)}${requestInfo} [${this.displayLabel(labelInner)}] {${process.pid}} ${levelInner}: ${String(message)}`;
        },
      ),
    );
  }

  private displayLabel(label: unknown): string {
    const text = typeof label === 'string' ? label : '';
    if (this.showLocation && text) {
      const className = text.split('/').pop();
      if (className && className !== 'Object') {
        return className;
      }
    }
    return text;
  }
}
