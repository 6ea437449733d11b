import { describe, expect, it, vi } from 'vitest';
import { applyConfiguredLogLevels, resolveLogLevels } from '../apps/monitor/src/logging';

describe('resolveLogLevels', () => {
  it('enables every level at or above the configured one', () => {
    expect(resolveLogLevels('warn')).toEqual(['fatal', 'error', 'warn']);
    expect(resolveLogLevels('info')).toEqual(['fatal', 'error', 'warn', 'log']);
  });

  it('accepts mixed case and maps trace to verbose', () => {
    expect(resolveLogLevels(' TRACE ')).toEqual(['fatal', 'error', 'warn', 'log', 'debug', 'verbose']);
  });

  it('falls back to info', () => {
    expect(resolveLogLevels(undefined)).toEqual(['fatal', 'error', 'warn', 'log']);
    expect(resolveLogLevels('loud')).toEqual(['fatal', 'error', 'warn', 'log']);
  });
});

describe('applyConfiguredLogLevels', () => {
  it('uses LOG_LEVEL from the loaded configuration', () => {
    const app = { useLogger: vi.fn() };
    const configService = { get: vi.fn(() => 'debug') };

    const levels = applyConfiguredLogLevels(app, configService as never);

    expect(configService.get).toHaveBeenCalledWith('LOG_LEVEL');
    expect(levels).toEqual(['fatal', 'error', 'warn', 'log', 'debug']);
    expect(app.useLogger).toHaveBeenCalledWith(['fatal', 'error', 'warn', 'log', 'debug']);
  });
});
