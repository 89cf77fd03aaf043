export {
  loadAggregationConfig,
  defaultAggregationConfig,
  defaultRetryPolicy,
} from "./aggregationConfig";
export type { LoadConfigOptions } from "./aggregationConfig";
