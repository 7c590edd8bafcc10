import type { Strategy } from './types.js';
import { emaCrossover, macdCrossover, smaCrossover } from './crossover.js';
import { meanReversion, momentum, rsiReversal } from './oscillators.js';
import { bollingerBands, breakout } from './bands.js';

export const REFERENCE_STRATEGIES: readonly Strategy[] = [
  smaCrossover,
  emaCrossover,
  rsiReversal,
  macdCrossover,
  bollingerBands,
  breakout,
  meanReversion,
  momentum,
];
