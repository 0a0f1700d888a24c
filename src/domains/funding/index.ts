// Types
export type { FundingRateInput, NextFundingInput } from "./funding";

// Constants
export { SECONDS_PER_DAY } from "./funding";

// Funding math
export {
  accruedFunding,
  currentFundingRate,
  nextFundingEntry,
  proportionalSkew,
  unrecordedFunding,
} from "./funding";
