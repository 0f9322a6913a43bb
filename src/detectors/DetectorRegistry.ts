import { PerMarketDetectorKind } from '../types';
import { MarketDetector } from './types';
import { detectCryptoLeadLag } from './CryptoLeadLagDetector';
import { detectDutchBook } from './DutchBookDetector';
import { detectEndgameSweep } from './EndgameSweepDetector';
import { detectOrderBookImbalance } from './OrderBookImbalanceDetector';
import { detectSpike } from './SpikeDetector';
import { detectTemporalArbitrage } from './TemporalArbitrageDetector';
import { detectTrendBreakout } from './TrendBreakoutDetector';
import { detectVolatilityHarvest } from './VolatilityHarvestDetector';
import { detectZombieHunter } from './ZombieHunterDetector';

export { detectCrossMarket } from './CrossMarketDetector';

/**
 * Per-market detector for every rule kind except the group-level
 * CROSS_MARKET_MISPRICE, which runs once per cycle over synonym groups.
 */
export const MARKET_DETECTORS: Record<PerMarketDetectorKind, MarketDetector> = {
  DUTCH_BOOK_DETECT: detectDutchBook,
  SPIKE_DETECT: detectSpike,
  TREND_BREAKOUT: detectTrendBreakout,
  ENDGAME_SWEEP: detectEndgameSweep,
  ORDER_BOOK_IMBALANCE: detectOrderBookImbalance,
  CRYPTO_LEAD_LAG: detectCryptoLeadLag,
  TEMPORAL_ARBITRAGE: detectTemporalArbitrage,
  VOLATILITY_HARVEST: detectVolatilityHarvest,
  ZOMBIE_HUNTER: detectZombieHunter,
};
