import { createLogger, LogEntry, LogLevel, resetLogging, setLogHandler, setLogLevel } from '../src/logger';

describe('logger', () => {
  let entries: LogEntry[];

  beforeEach(() => {
    entries = [];
    setLogHandler((entry) => entries.push(entry));
  });

  afterEach(() => {
    jest.restoreAllMocks();
    resetLogging();
  });

  test('entries carry the component and the module of a child logger', () => {
    createLogger().child('registry').info('Canonical unit created', { canonicalId: 'geo_1' });

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: LogLevel.Info,
      message: 'Canonical unit created',
      component: 'geo-reconcile',
      module: 'registry',
      context: { canonicalId: 'geo_1' },
    });
  });

  test('a child keeps its parent context and may replace the module', () => {
    const ingest = createLogger('ingest', { requestId: 'req-1' });
    ingest.child('matcher', { unitId: 'tgu_1' }).warn('Near tie');

    expect(entries[0].module).toBe('matcher');
    expect(entries[0].context).toEqual({ requestId: 'req-1', unitId: 'tgu_1' });
  });

  test('the root logger has no module and no empty context', () => {
    createLogger().info('Server listening');

    expect(entries[0].module).toBeUndefined();
    expect(entries[0].context).toBeUndefined();
  });

  test('entries under the minimum level are dropped', () => {
    setLogLevel(LogLevel.Warn);
    const log = createLogger('conflicts');
    log.info('Conflict opened');
    log.error('Resolution failed');

    expect(entries.map((e) => e.message)).toEqual(['Resolution failed']);
  });

  test('the console handler writes one JSON line with component and module', () => {
    resetLogging();
    const write = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    createLogger('api').info('Request handled', { status: 200 });

    expect(write).toHaveBeenCalledTimes(1);
    const line: unknown = JSON.parse(String(write.mock.calls[0][0]));
    expect(line).toMatchObject({
      level: 'info',
      component: 'geo-reconcile',
      module: 'api',
      msg: 'Request handled',
      status: 200,
    });
  });
});
