export {
  DECIMALS,
  UNIT,
  abs,
  clamp,
  divideDecimal,
  formatDecimal,
  max,
  min,
  multiplyDecimal,
  parseDecimal,
  sameSide,
  toUnit,
} from "./decimal";

export { decimalStringSchema } from "./schema";

export { DecimalError, type DecimalErrorCode } from "./errors";
