import 'dotenv/config';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

function parseLogLevel(raw: string | undefined): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === raw);
  return level ?? 'info';
}

export const config = {
  port: parseInt(process.env.PORT || '8080', 10),
  host: process.env.HOST || 'localhost',
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
  // where the HTML surface sends the browser after a successful form submit
  listPagePath: '/items',
};
