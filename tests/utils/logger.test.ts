import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  ConsoleTransport,
  FileTransport,
  Formatter,
  JsonFormatter,
  LogEntry,
  Logger,
  PrettyFormatter,
  Transport,
  isLogLevel,
} from '../../src/utils/logger';

jest.mock('../../src/utils/dateFormatter', () => ({
  formatDate: jest.fn(() => 'May 04, 2025 01:56:21 PM UTC'),
}));

const plain: Formatter = { format: (entry) => String(entry.message) };

class MemoryTransport implements Transport {
  public formatter: Formatter = plain;
  public readonly lines: string[] = [];
  public readonly entries: LogEntry[] = [];

  constructor(public level?: Transport['level']) {}

  log(formattedMessage: string, entry: LogEntry): void {
    this.lines.push(formattedMessage);
    this.entries.push(entry);
  }
}

const entry = (overrides: Partial<LogEntry> = {}): LogEntry => ({
  level: 'info',
  message: 'hello',
  timestamp: new Date('2025-05-04T13:56:21Z'),
  ...overrides,
});

describe('PrettyFormatter', () => {
  const formatter = new PrettyFormatter({ useColors: false });

  test('renders icon, level and message', () => {
    expect(formatter.format(entry())).toBe('ℹ INFO hello');
    expect(formatter.format(entry({ level: 'http', message: 'GET /index.html 200' }))).toBe(
      '↔ HTTP GET /index.html 200',
    );
  });

  test('appends metadata as indented JSON', () => {
    expect(formatter.format(entry({ meta: { port: 7777 } }))).toBe(
      'ℹ INFO hello\n\tMeta: \n{\n    "port": 7777\n}',
    );
  });

  test('omits an empty metadata block', () => {
    expect(formatter.format(entry({ meta: {} }))).toBe('ℹ INFO hello');
  });

  test('truncates long messages', () => {
    const short = new PrettyFormatter({ useColors: false, stringLengthLimit: 5 });
    expect(short.format(entry({ message: 'abcdefgh' }))).toBe('ℹ INFO abcde...');
  });

  test('renders errors by name and message', () => {
    const err = new Error('boom');
    err.stack = undefined;
    expect(formatter.format(entry({ level: 'error', message: err }))).toBe('✖ ERROR Error: boom');
  });

  test('serializes object messages', () => {
    expect(formatter.format(entry({ level: 'debug', message: { a: 1 } }))).toBe('D DEBUG {"a":1}');
  });
});

describe('JsonFormatter', () => {
  const formatter = new JsonFormatter();

  test('writes level, message and formatted timestamp', () => {
    expect(formatter.format(entry())).toBe(
      '{"level":"info","message":"hello","timestamp":"May 04, 2025 01:56:21 PM UTC"}',
    );
  });

  test('moves error details into the metadata', () => {
    const err = new Error('disk full');
    err.stack = 'Error: disk full';
    expect(formatter.format(entry({ level: 'error', message: err }))).toBe(
      '{"level":"error","message":"disk full","timestamp":"May 04, 2025 01:56:21 PM UTC"}' +
        '\n\tMeta: \n{"name":"Error","stack":"Error: disk full"}',
    );
  });

  test('serializes bigint metadata as strings', () => {
    expect(formatter.format(entry({ meta: { bytes: BigInt(10) } }))).toBe(
      '{"level":"info","message":"hello","timestamp":"May 04, 2025 01:56:21 PM UTC"}' +
        '\n\tMeta: \n{"bytes":"10"}',
    );
  });

  test('survives circular metadata', () => {
    const meta: Record<string, unknown> = {};
    meta.self = meta;
    expect(formatter.format(entry({ meta }))).toBe(
      '{"level":"info","message":"hello","timestamp":"May 04, 2025 01:56:21 PM UTC"}' +
        '\n\tMeta: \n[Unserializable Meta]',
    );
  });
});

describe('Logger', () => {
  test('drops entries below its threshold', () => {
    const memory = new MemoryTransport();
    const log = new Logger({ level: 'warn', transports: [memory] });
    log.info('quiet');
    log.warn('loud');
    log.error('louder');
    expect(memory.lines).toEqual(['loud', 'louder']);
  });

  test('treats success as info', () => {
    const memory = new MemoryTransport();
    const log = new Logger({ level: 'info', transports: [memory] });
    log.success('started');
    log.http('GET / 200');
    expect(memory.lines).toEqual(['started']);
  });

  test('honours per-transport thresholds', () => {
    const everything = new MemoryTransport();
    const errorsOnly = new MemoryTransport('error');
    const log = new Logger({ level: 'silly', transports: [everything, errorsOnly] });
    log.debug('detail');
    log.error('failure');
    expect(everything.lines).toEqual(['detail', 'failure']);
    expect(errorsOnly.lines).toEqual(['failure']);
  });

  test('merges child metadata into every entry', () => {
    const memory = new MemoryTransport();
    const log = new Logger({ transports: [memory], metadata: { service: 'static' } });
    log.child({ remoteAddress: '10.0.0.2' }).warn('Rejected request', { status: 405 });
    expect(memory.entries[0].meta).toEqual({
      service: 'static',
      remoteAddress: '10.0.0.2',
      status: 405,
    });
  });

  test('children follow the parent threshold', () => {
    const memory = new MemoryTransport();
    const log = new Logger({ level: 'info', transports: [memory] });
    const child = log.child({ remoteAddress: '10.0.0.2' });
    child.debug('hidden');
    log.setLevel('debug');
    child.debug('shown');
    expect(child.level).toBe('debug');
    expect(memory.lines).toEqual(['shown']);
  });

  test('keeps logging when a transport throws', () => {
    const consoleSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const broken: Transport = {
      formatter: plain,
      log: () => {
        throw new Error('transport down');
      },
    };
    const memory = new MemoryTransport();
    const log = new Logger({ transports: [broken, memory] });
    log.info('still here');
    expect(memory.lines).toEqual(['still here']);
    expect(consoleSpy).toHaveBeenCalledTimes(1);
    consoleSpy.mockRestore();
  });

  test('recognizes log level names', () => {
    expect(isLogLevel('http')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
  });
});

describe('ConsoleTransport', () => {
  test.each([
    ['error', 'error'],
    ['warn', 'warn'],
    ['info', 'log'],
    ['debug', 'log'],
  ] as const)('routes %s to console.%s', (level, method) => {
    const spy = jest.spyOn(console, method).mockImplementation(() => undefined);
    const log = new Logger({
      level: 'silly',
      transports: [new ConsoleTransport({ formatter: plain })],
    });
    log.log(level, 'routed');
    expect(spy).toHaveBeenCalledWith('routed');
    spy.mockRestore();
  });
});

describe('FileTransport', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'static-server-logs-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('appends JSON lines and creates the directory', async () => {
    const filename = path.join(dir, 'nested', 'server.json');
    const transport = new FileTransport({ filename });
    const log = new Logger({ transports: [transport] });
    log.info('saved');
    log.warn('again');
    await log.close();

    expect(fs.readFileSync(filename, 'utf8')).toBe(
      '{"level":"info","message":"saved","timestamp":"May 04, 2025 01:56:21 PM UTC"}\n' +
        '{"level":"warn","message":"again","timestamp":"May 04, 2025 01:56:21 PM UTC"}\n',
    );
  });
});
