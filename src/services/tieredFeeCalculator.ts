import { FeeResult, IFeeCalculator, PricingTier } from "../interfaces/feeCalculator";
import { InvalidTimeRangeError } from "../errors";

const MS_PER_HOUR = 3_600_000;

/**
 * Flat fee for the first `fixedHours`, then `perHourRate` for every further
 * started hour. Any stay, even a zero-length one, bills at least one hour.
 */
export class TieredFeeCalculator implements IFeeCalculator {
  constructor(private tier: PricingTier) {}

  calculate(entryTime: Date, exitTime: Date): FeeResult {
    const elapsed = exitTime.getTime() - entryTime.getTime();
    if (elapsed < 0) throw new InvalidTimeRangeError(entryTime, exitTime);

    const billedHours = Math.max(1, Math.ceil(elapsed / MS_PER_HOUR));
    const { fixedHours, fixedRate, perHourRate } = this.tier;
    if (billedHours <= fixedHours) return { fee: fixedRate, billedHours };
    return { fee: fixedRate + (billedHours - fixedHours) * perHourRate, billedHours };
  }
}
