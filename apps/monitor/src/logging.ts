import { INestApplicationContext, LogLevel } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

const ORDERED: Array<{ env: string; nest: LogLevel }> = [
  { env: 'fatal', nest: 'fatal' },
  { env: 'error', nest: 'error' },
  { env: 'warn', nest: 'warn' },
  { env: 'info', nest: 'log' },
  { env: 'debug', nest: 'debug' },
  { env: 'trace', nest: 'verbose' },
];

/** Maps LOG_LEVEL onto the Nest levels at or above it. Unknown values fall back to `info`. */
export const resolveLogLevels = (level: string | undefined): LogLevel[] => {
  const normalized = (level ?? 'info').trim().toLowerCase();
  const index = ORDERED.findIndex((item) => item.env === normalized);
  const cutoff = index === -1 ? 3 : index;
  return ORDERED.slice(0, cutoff + 1).map((item) => item.nest);
};

/** Re-applies the levels once ConfigModule has loaded `.env`. */
export const applyConfiguredLogLevels = (
  app: Pick<INestApplicationContext, 'useLogger'>,
  configService: Pick<ConfigService, 'get'>,
): LogLevel[] => {
  const levels = resolveLogLevels(configService.get<string>('LOG_LEVEL'));
  app.useLogger(levels);
  return levels;
};
