export interface PricingTier {
  fixedHours: number;
  fixedRate: number;
  perHourRate: number;
}

export interface FeeResult {
  fee: number;
  billedHours: number;
}

export interface IFeeCalculator {
  calculate(entryTime: Date, exitTime: Date): FeeResult;
}
