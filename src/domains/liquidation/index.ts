// Types
export type { LiquidationPayout } from "./liquidation";

// Liquidation math
export {
  approxLiquidationFee,
  approxLiquidationPrice,
  canLiquidate,
  liquidationFee,
  liquidationMargin,
  liquidationPayout,
} from "./liquidation";
