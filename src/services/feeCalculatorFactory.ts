import { IFeeCalculator, PricingTier } from "../interfaces/feeCalculator";
import { TieredFeeCalculator } from "./tieredFeeCalculator";
import { Category, isCategory } from "../dtos/vehicle.dto";
import { PRICING } from "../config/lotConfig";

export class FeeCalculatorFactory {
  constructor(private pricing: Readonly<Record<Category, PricingTier>> = PRICING) {}

  /** Unknown categories are billed like a CAR. */
  for(category: string): IFeeCalculator {
    const tier = isCategory(category) ? this.pricing[category] : this.pricing.CAR;
    return new TieredFeeCalculator(tier);
  }
}
