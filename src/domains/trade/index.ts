// Types
export type { FeeContext, FeePolicy } from "./fees";
export type { TradeInput, TradeProjection, TradeRejection, TradeStatus } from "./post-trade";

// Constants
export { LEVERAGE_TOLERANCE, MARKET_VALUE_TOLERANCE } from "./post-trade";

// Fees
export { baseFeePolicy, orderFee, skewFeePolicy } from "./fees";

// Projection
export { orderSizeTooLarge, postTradeDetails } from "./post-trade";
