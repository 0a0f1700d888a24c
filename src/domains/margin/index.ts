// Types
export type { MarginLimits, MarginTransferStatus, Valuation } from "./margin";

// Constants
export { MARGIN_TOLERANCE } from "./margin";

// Margin math
export {
  accessibleMargin,
  checkMarginTransfer,
  currentLeverage,
  notionalValue,
  positionDebtCorrection,
  profitLoss,
  rawRemainingMargin,
  remainingMargin,
} from "./margin";
