import { ConsoleLogger } from '../../../src/adapters/sys/ConsoleLogger';

describe('ConsoleLogger', () => {
  let debugSpy: jest.SpyInstance;
  let infoSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    debugSpy = jest.spyOn(console, 'debug').mockImplementation(() => {});
    infoSpy = jest.spyOn(console, 'info').mockImplementation(() => {});
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {});
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('debug is silent unless debug mode is on', () => {
    new ConsoleLogger().debug('hidden');
    expect(debugSpy).not.toHaveBeenCalled();

    new ConsoleLogger({ debug: true }).debug('hello', { a: 1 });
    expect(debugSpy).toHaveBeenCalledWith('hello {"a":1}');
  });

  test('info logs message', () => {
    new ConsoleLogger().info('world');
    expect(infoSpy).toHaveBeenCalledWith('world');
  });

  test('warn omits empty meta', () => {
    new ConsoleLogger().warn('careful', {});
    expect(warnSpy).toHaveBeenCalledWith('careful');
  });

  test('error logs with meta when provided', () => {
    new ConsoleLogger().error('oops', { reason: 'bad' });
    expect(errorSpy).toHaveBeenCalledWith('oops {"reason":"bad"}');
  });

  test('child loggers prefix every line and keep the debug setting', () => {
    const child = new ConsoleLogger({ debug: true }).child('capture');
    child.info('opened');
    child.debug('frame');

    expect(infoSpy).toHaveBeenCalledWith('[capture] opened');
    expect(debugSpy).toHaveBeenCalledWith('[capture] frame');
  });
});
