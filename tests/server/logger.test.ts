import { createLogger } from '../../server/logger';

describe('createLogger', () => {
  let log: jest.SpyInstance;
  let warn: jest.SpyInstance;
  let error: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => {});
    warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
    error = jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('prefixes every line with its tag', () => {
    const logger = createLogger('conn', { debug: false });
    const err = new Error('boom');

    logger.info('New client connected from a:1');
    logger.warn('slow');
    logger.error('Error processing message from a:1:', err);

    expect(log).toHaveBeenCalledWith('[conn] New client connected from a:1');
    expect(warn).toHaveBeenCalledWith('[conn] slow');
    expect(error).toHaveBeenCalledWith('[conn] Error processing message from a:1:', err);
  });

  test('drops debug lines unless enabled', () => {
    createLogger('session', { debug: false }).debug('Partial result: hi');
    expect(log).not.toHaveBeenCalled();

    createLogger('session', { debug: true }).debug('Partial result: hi');
    expect(log).toHaveBeenCalledWith('[session] Partial result: hi');
  });

  test('reads LOG_DEBUG when no option is given', () => {
    const previous = process.env.LOG_DEBUG;
    process.env.LOG_DEBUG = '1';
    try {
      createLogger('upstream').debug('opened');
    } finally {
      if (previous === undefined) delete process.env.LOG_DEBUG;
      else process.env.LOG_DEBUG = previous;
    }

    expect(log).toHaveBeenCalledWith('[upstream] opened');
  });
});
