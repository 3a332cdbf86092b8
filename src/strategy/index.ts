export {
  DEFAULT_CATALOG,
  DEFAULT_TIERS,
  type DiscountTier,
  FLAT_PERCENTAGE,
  flatPercentage,
  percentageOf,
  type Strategy,
  TIERED_THRESHOLD,
  tieredThreshold,
} from './catalog.js';
export { StrategyResolver, type StrategyResolverOptions } from './strategy-resolver.js';
