import { Injectable } from '@nestjs/common';
import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as dotenv from 'dotenv';
import { ZIBAL_BASE_URL } from '@/modules/zibal/zibal.constants';

export interface ZibalConfig {
  baseUrl: string;
}

export interface LogConfig {
  level: string;
  dir: string;
}

@Injectable()
export class AppConfigService {
  constructor() {
    dotenv.config({
      path: `.env`,
    });
  }

  public get(key: string): string {
    return process.env[key] || '';
  }

  get nodeEnv(): string {
    return this.get('NODE_ENV') || 'development';
  }

  get zibalConfig(): ZibalConfig {
    const baseUrl = this.get('ZIBAL_BASE_URL').trim() || ZIBAL_BASE_URL;
    return {
      baseUrl: baseUrl.replace(/\/+$/, ''),
    };
  }

  get logConfig(): LogConfig {
    return {
      level: this.get('LOG_LEVEL') || 'info',
      dir: this.get('LOG_DIR'),
    };
  }

  get winstonConfig(): winston.LoggerOptions {
    const { level, dir } = this.logConfig;

    const consoleTransport = new winston.transports.Console({
      level,
      handleExceptions: true,
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({
          format: 'DD-MM-YYYY HH:mm:ss',
        }),
        winston.format.printf(({ level, message, timestamp, context, trace }) => {
          const ctx = context ? ` [${String(context)}]` : '';
          const msgStr = typeof message === 'string' ? message : JSON.stringify(message);
          const stackStr = trace ? `\n${String(trace)}` : '';
          return `${String(timestamp)} ${level}:${ctx} ${msgStr}${stackStr}`;
        }),
      ),
    });

    const fileTransports = dir
      ? [
          new DailyRotateFile({
            level: 'debug',
            filename: `${dir}/${this.nodeEnv}/debug-%DATE%.log`,
            datePattern: 'YYYY-MM-DD',
            zippedArchive: true,
            maxSize: '20m',
            maxFiles: '14d',
            format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
          }),
          new DailyRotateFile({
            level: 'error',
            filename: `${dir}/${this.nodeEnv}/error-%DATE%.log`,
            datePattern: 'YYYY-MM-DD',
            zippedArchive: false,
            maxSize: '20m',
            maxFiles: '30d',
            format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
          }),
        ]
      : [];

    return {
      level,
      transports: [consoleTransport, ...fileTransports],
      exitOnError: false,
    };
  }
}
