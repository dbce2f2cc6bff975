import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import winston from 'winston';
import { configureLogging, createServiceLogger, logger, scriptLogger } from './logger';

const fileTransports = (target: winston.Logger) =>
  target.transports.filter(transport => transport instanceof winston.transports.File);

describe('logger', () => {
  const directory = fs.mkdtempSync(path.join(os.tmpdir(), 'scriptenv-logs-'));

  afterEach(() => {
    configureLogging({ level: 'error' });
  });

  it('reuses the logger of a service', () => {
    expect(createServiceLogger('script')).toBe(scriptLogger);
  });

  it('keeps a single file transport across repeated configuration', () => {
    configureLogging({ file: path.join(directory, 'first.log') });
    configureLogging({ file: path.join(directory, 'second.log') });

    expect(fileTransports(logger)).toHaveLength(1);
    expect(fileTransports(scriptLogger)).toHaveLength(1);
    expect(fileTransports(logger)[0]).toBe(fileTransports(scriptLogger)[0]);
  });

  it('drops the file transport when no file is configured', () => {
    configureLogging({ file: path.join(directory, 'dropped.log') });
    configureLogging({});

    expect(fileTransports(logger)).toHaveLength(0);
    expect(fileTransports(scriptLogger)).toHaveLength(0);
  });

  it('lets LOG_LEVEL win over the configured level', () => {
    configureLogging({ level: 'debug' });

    expect(logger.level).toBe(process.env.LOG_LEVEL);
  });
});
