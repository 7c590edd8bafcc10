/**
 * Logger Tests
 */

import winston from 'winston';
import { logger, Logger } from '../../src/index.js';

function silentSink(): winston.Logger {
  return winston.createLogger({ silent: true });
}

describe('Logger', () => {
  it('should use the root namespace', () => {
    expect(logger.getNamespace()).toBe('tradelab');
  });

  it('should write info and warn entries with the namespace', () => {
    const sink = silentSink();
    const info = vi.spyOn(sink, 'info').mockReturnValue(sink);
    const warn = vi.spyOn(sink, 'warn').mockReturnValue(sink);
    const runLogger = new Logger('@tradelab/backtest', {}, sink);

    runLogger.info('Run finished', { runId: 'abc' });
    runLogger.warn('Combination skipped');

    expect(info).toHaveBeenCalledWith('Run finished', { namespace: '@tradelab/backtest', runId: 'abc' });
    expect(warn).toHaveBeenCalledWith('Combination skipped', { namespace: '@tradelab/backtest' });
  });

  it('should write debug entries', () => {
    const sink = silentSink();
    const debug = vi.spyOn(sink, 'debug').mockReturnValue(sink);

    new Logger('@tradelab/backtest', {}, sink).debug('Run started', { symbol: 'BTC-USD' });

    expect(debug).toHaveBeenCalledWith('Run started', { namespace: '@tradelab/backtest', symbol: 'BTC-USD' });
  });

  it('should flatten Error objects', () => {
    const sink = silentSink();
    const spy = vi.spyOn(sink, 'error').mockReturnValue(sink);
    const error = new Error('Test error');

    new Logger('@tradelab/backtest', {}, sink).error('Error occurred', error);

    expect(spy).toHaveBeenCalledWith('Error occurred', {
      namespace: '@tradelab/backtest',
      error: { name: 'Error', message: 'Test error', stack: error.stack },
    });
  });

  it('should log non-Error values as-is', () => {
    const sink = silentSink();
    const spy = vi.spyOn(sink, 'error').mockReturnValue(sink);

    new Logger('@tradelab/backtest', {}, sink).error('Error occurred', 'boom');

    expect(spy).toHaveBeenCalledWith('Error occurred', { namespace: '@tradelab/backtest', error: 'boom' });
  });

  it('should carry child context into every entry without changing the parent', () => {
    const sink = silentSink();
    const spy = vi.spyOn(sink, 'info').mockReturnValue(sink);
    const parent = new Logger('@tradelab/backtest', { strategy: 'macd' }, sink);
    const child = parent.child({ symbol: 'ETH-USD' });

    child.info('Sweep started', { total: 4 });
    parent.info('Registry loaded');

    expect(child.getNamespace()).toBe('@tradelab/backtest');
    expect(spy.mock.calls).toEqual([
      ['Sweep started', { namespace: '@tradelab/backtest', strategy: 'macd', symbol: 'ETH-USD', total: 4 }],
      ['Registry loaded', { namespace: '@tradelab/backtest', strategy: 'macd' }],
    ]);
  });
});
