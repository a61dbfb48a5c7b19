export { MonthlyAggregator, expectedDays, type AggregatorDeps } from "./monthlyAggregator";
export { HILBERT_ORDER, hilbertIndex, lonLatKey, sortBySpatialKey } from "./spatialOrder";
