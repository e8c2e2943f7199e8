import { ConsoleLogger } from './consoleLogger';
import { createEvent } from '../types/events';

describe('ConsoleLogger', () => {
  it('writes events to stderr only when verbose', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const event = createEvent('run-1', {
      type: 'BatchStarted',
      payload: { packageCount: 2, concurrency: 1 },
    });

    new ConsoleLogger().log(event);
    expect(errorSpy).not.toHaveBeenCalled();

    new ConsoleLogger({ verbose: true }).log(event);
    expect(errorSpy).toHaveBeenCalledWith(JSON.stringify(event));

    errorSpy.mockRestore();
  });

  it('hides debug lines unless verbose and handles error branches', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = new ConsoleLogger();
    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error(new Error('boom'));
    logger.error(new Error('boom'), 'msg');

    expect(errorSpy).not.toHaveBeenCalledWith('d');
    expect(errorSpy).toHaveBeenCalledWith('i');
    expect(errorSpy).toHaveBeenCalledWith('w');
    expect(errorSpy).toHaveBeenCalledWith(expect.any(Error));
    expect(errorSpy).toHaveBeenCalledWith('msg', expect.any(Error));

    new ConsoleLogger({ verbose: true }).debug('d');
    expect(errorSpy).toHaveBeenCalledWith('d');

    errorSpy.mockRestore();
  });

  it('scopes child loggers with prefixes and merges bindings', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = new ConsoleLogger();
    logger.child({}).info('no-prefix');
    expect(errorSpy).toHaveBeenCalledWith('no-prefix');

    logger.child({ pkg: 'six' }).child({ step: 'stub' }).info('hello');
    expect(errorSpy).toHaveBeenCalledWith('[pkg=six step=stub] hello');

    logger.child({ pkg: 'attrs' }).warn('slow');
    expect(errorSpy).toHaveBeenCalledWith('[pkg=attrs] slow');

    errorSpy.mockRestore();
  });
});
