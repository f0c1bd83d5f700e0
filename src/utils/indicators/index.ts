// Re-export all indicator functions from their respective modules

// Moving Averages
export { sma, alma, almaWeights, almaSeries } from './moving-averages';

// Volatility
export { sampleStddev, stdevSeries } from './volatility';

// Trend
export { Direction, supertrendBands, almaSupertrendSeries } from './trend';

// Utils
export { firstDefinedIndex, nullSeries, definedTail } from './utils';

// Types
export type { Num } from './moving-averages';
export type { AlmaSupertrend, AlmaSupertrendOptions } from './trend';
