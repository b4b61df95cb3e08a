import LoggerService from './logger';

describe('LoggerService without a terminal', () => {
  let stderr: jest.SpyInstance;
  let warn: jest.SpyInstance;

  beforeEach(() => {
    stderr = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('writes info and error lines to stderr and warnings through console.warn', () => {
    const logger = new LoggerService({ enableInk: false });

    logger.info('hello');
    logger.error('broken');
    logger.warn('careful');

    expect(stderr.mock.calls).toEqual([['hello'], ['broken']]);
    expect(warn).toHaveBeenCalledWith('careful');
  });

  it('drops debug lines until debug is enabled', () => {
    const logger = new LoggerService({ enableInk: false });

    logger.debug('hidden');
    logger.setDebug(true);
    logger.debug('shown');

    expect(logger.isDebugEnabled).toBe(true);
    expect(stderr.mock.calls).toEqual([['shown']]);
  });

  it('reports page progress as debug lines', () => {
    const logger = new LoggerService({ enableInk: false, debug: true });

    logger.recordPage('Fetching groups', 2, 150, 200);
    logger.recordPage('Fetching groups', 3, 220);
    logger.clearGlobalProgress();

    expect(stderr.mock.calls).toEqual([
      ['Fetching groups: page 2, 150/200 records'],
      ['Fetching groups: page 3, 220 records'],
    ]);
  });

  it('starts and stops without rendering when Ink is disabled', async () => {
    const logger = new LoggerService({ enableInk: false });

    await expect(logger.start()).resolves.toBeUndefined();
    expect(() => logger.stop()).not.toThrow();
  });
});
