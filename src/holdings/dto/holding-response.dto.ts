// Metrics for one equity holding
export interface StockMetricsDto {
  purchaseId: string;
  symbol: string;
  quantity: number;
  earnings: number;                // (current - purchase) × quantity
  percentYield: number;            // price appreciation in %
  yearlyReturn: number;            // annualized, in %
}

// Metrics for one bond holding
export interface BondMetricsDto {
  purchaseId: string;
  symbol: string;
  quantity: number;
  earnings: number;                // capital gain + yield income
  coupon: number;
  yieldRate: number;               // fraction, 0.0135 for 1.35%
  purchaseDate: string;
}

// Response after a manual bond upsert
export interface BondUpsertResponseDto {
  bond: BondMetricsDto;
  message: string;
}
