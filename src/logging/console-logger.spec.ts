/**
 * Console Logger Tests
 */

import { ConsoleLogger } from './console-logger';

describe('console-logger', () => {
  let logSpy: jest.SpyInstance;
  let debugSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    debugSpy = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should prefix every line', () => {
    const logger = new ConsoleLogger('topic-deck');

    logger.info('Found 2 topic file(s)');
    logger.warn('Not found: a.yml', { path: 'a.yml' });

    expect(logSpy).toHaveBeenCalledWith('[topic-deck] Found 2 topic file(s)');
    expect(warnSpy).toHaveBeenCalledWith('[topic-deck] Not found: a.yml', { path: 'a.yml' });
  });

  it('should drop messages below the level', () => {
    const logger = new ConsoleLogger('topic-deck', 'warn');

    logger.debug('d');
    logger.info('i');
    logger.warn('w');

    expect(debugSpy).not.toHaveBeenCalled();
    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it('should emit debug output at the debug level', () => {
    new ConsoleLogger('topic-deck', 'debug').debug('Assembled deck "T"', { slides: 3 });

    expect(debugSpy).toHaveBeenCalledWith('[topic-deck] Assembled deck "T"', { slides: 3 });
  });

  it('should pass errors through', () => {
    const err = new Error('boom');

    new ConsoleLogger('topic-deck').error('Error processing a.yml', err);

    expect(errorSpy).toHaveBeenCalledWith('[topic-deck] Error processing a.yml', err);
  });
});
