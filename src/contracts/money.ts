/** Integer count of minor currency units (cents). Never a fractional amount. */
export type Cents = number;
