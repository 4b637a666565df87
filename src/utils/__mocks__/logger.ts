// Manual mock for src/utils/logger, picked up by jest.mock('.../utils/logger').
// Every method is a jest.fn; child() hands back the same mock so calls made
// through child loggers can be asserted on the default export.

const mockLogger = {
  error: jest.fn(),
  warn: jest.fn(),
  info: jest.fn(),
  success: jest.fn(),
  http: jest.fn(),
  verbose: jest.fn(),
  debug: jest.fn(),
  silly: jest.fn(),
  log: jest.fn(),
  setLevel: jest.fn(),
  addTransport: jest.fn(),
  close: jest.fn(() => Promise.resolve()),
  child: jest.fn(),
};
mockLogger.child.mockImplementation(() => mockLogger);

export const LOG_LEVELS = ['error', 'warn', 'info', 'success', 'http', 'verbose', 'debug', 'silly'] as const;

export function isLogLevel(value: string): boolean {
  return LOG_LEVELS.some((level) => level === value);
}

export class Logger {
  constructor() {
    return mockLogger;
  }
}

export class JsonFormatter {
  format = jest.fn().mockReturnValue('{"mocked": "json"}');
}

export class PrettyFormatter {
  format = jest.fn().mockReturnValue('mocked pretty format');
}

export class ConsoleTransport {
  log = jest.fn();
}

export class FileTransport {
  log = jest.fn();
  close = jest.fn(() => Promise.resolve());
}

export default mockLogger;
