import pino from 'pino';
import { env } from '../config/env.js';
import path from 'path';

const logFile = path.join(process.cwd(), 'logs', 'app.log');

const isDevelopment = env.NODE_ENV === 'development';
const isTest = env.NODE_ENV === 'test';

const defaultLevel = isTest ? 'silent' : isDevelopment ? 'debug' : 'info';

export const logger = pino({
  level: env.LOG_LEVEL ?? defaultLevel,
  // 测试环境：不输出；开发环境：控制台（美化）+ 文件；生产环境：文件
  transport: isTest
    ? undefined
    : isDevelopment
      ? {
          targets: [
            {
              target: 'pino-pretty',
              level: 'debug',
              options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname',
              },
            },
            {
              target: 'pino/file',
              level: 'debug',
              options: {
                destination: logFile,
                mkdir: true,
              },
            },
          ],
        }
      : {
          target: 'pino/file',
          options: {
            destination: logFile,
            mkdir: true,
          },
        },
});
