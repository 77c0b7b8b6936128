export type RateQuote = {
  base: string;
  target: string;
  rate: number;
  /** Provider publication date, `YYYY-MM-DD`. */
  asOf: string | null;
  fetchedAt: Date | null;
  provider: string;
};

export type Conversion = {
  from: string;
  to: string;
  amount: number;
  converted: number;
  rate: number;
  asOf: string | null;
  fetchedAt: Date | null;
  provider: string;
};
