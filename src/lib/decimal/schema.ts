import * as v from "valibot";

import { parseDecimal } from "./decimal";

/** Decimal string such as `"-12.5"`, parsed into fixed-point. */
export const decimalStringSchema = v.pipe(
  v.string(),
  v.regex(/^-?\d+(\.\d{1,18})?$/, "must be a decimal string"),
  v.transform(parseDecimal),
);
