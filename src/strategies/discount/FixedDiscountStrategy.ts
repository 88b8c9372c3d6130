/**
 * 정액 할인 전략
 *
 * 주문 금액과 관계없이 고정 할인 금액 반환
 */

import { InvalidInputError } from "@/core/errors/StrategyErrors";
import { DISCOUNT_STRATEGY_TYPES } from "@/core/domain/DiscountStrategyType";
import {
  DiscountStrategy,
  DiscountStrategyOptions,
  assertOrderAmount,
} from "./types";

export class FixedDiscountStrategy implements DiscountStrategy {
  readonly type = DISCOUNT_STRATEGY_TYPES.FIXED;
  readonly name = "FixedDiscountStrategy";
  private readonly allowNegative: boolean;

  constructor(
    readonly amount: number,
    options: DiscountStrategyOptions = {},
  ) {
    if (!Number.isFinite(amount) || amount < 0) {
      throw new InvalidInputError(
        `Fixed discount amount must be a non-negative number: ${amount}`,
        "amount",
        amount,
      );
    }
    this.allowNegative = options.allowNegative ?? false;
  }

  apply(orderAmount: number): number {
    assertOrderAmount(orderAmount, this.allowNegative);
    return this.amount;
  }
}
