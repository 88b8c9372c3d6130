/**
 * 정률 할인 전략
 *
 * 할인 금액 = 주문 금액 × rate
 * - rate: 0 ~ 1 (예: 0.1 = 10%)
 * - 음수 주문 금액은 allowNegative 옵션이 있을 때만 계산
 */

import { InvalidInputError } from "@/core/errors/StrategyErrors";
import { DISCOUNT_STRATEGY_TYPES } from "@/core/domain/DiscountStrategyType";
import {
  DiscountStrategy,
  DiscountStrategyOptions,
  assertOrderAmount,
} from "./types";

export class PercentageDiscountStrategy implements DiscountStrategy {
  readonly type = DISCOUNT_STRATEGY_TYPES.PERCENTAGE;
  readonly name = "PercentageDiscountStrategy";
  private readonly allowNegative: boolean;

  constructor(
    readonly rate: number,
    options: DiscountStrategyOptions = {},
  ) {
    if (!Number.isFinite(rate) || rate < 0 || rate > 1) {
      throw new InvalidInputError(
        `Discount rate must be between 0 and 1: ${rate}`,
        "rate",
        rate,
      );
    }
    this.allowNegative = options.allowNegative ?? false;
  }

  apply(amount: number): number {
    assertOrderAmount(amount, this.allowNegative);
    return amount * this.rate;
  }
}
