import winston from 'winston';
import { createPackageLogger, LogHelpers, Logger } from '../../src/index.js';

describe('createPackageLogger', () => {
  it('should return the same logger for the same package', () => {
    const first = createPackageLogger('@tradelab/test-a');
    const second = createPackageLogger('@tradelab/test-a');

    expect(first).toBe(second);
    expect(first.getNamespace()).toBe('@tradelab/test-a');
  });

  it('should keep separate loggers per package', () => {
    expect(createPackageLogger('@tradelab/test-b')).not.toBe(createPackageLogger('@tradelab/test-c'));
  });
});

describe('LogHelpers', () => {
  it('should log cache operations at debug', () => {
    const sink = winston.createLogger({ silent: true });
    const spy = vi.spyOn(sink, 'debug').mockReturnValue(sink);

    LogHelpers.cache(new Logger('@tradelab/test-d', {}, sink), 'hit', 'BTC-USD:1d');

    expect(spy).toHaveBeenCalledWith('Cache hit', { namespace: '@tradelab/test-d', key: 'BTC-USD:1d' });
  });
});
