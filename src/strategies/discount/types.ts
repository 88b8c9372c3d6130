/**
 * Discount Strategy 공통 타입
 */

import { IStrategy } from "@/core/interfaces/IStrategy";
import { InvalidInputError } from "@/core/errors/StrategyErrors";

/**
 * 할인 전략: 주문 금액 → 할인 금액
 */
export type DiscountStrategy = IStrategy<number, number>;

/**
 * 할인 전략 공통 옵션
 */
export interface DiscountStrategyOptions {
  /** 음수 주문 금액 허용 여부 (기본값: false) */
  allowNegative?: boolean;
}

/**
 * 주문 금액 검증
 * - 유한한 숫자여야 함
 * - allowNegative=false면 0 이상
 */
export function assertOrderAmount(
  amount: number,
  allowNegative: boolean,
): void {
  if (typeof amount !== "number" || !Number.isFinite(amount)) {
    throw new InvalidInputError(
      `Order amount must be a finite number: ${String(amount)}`,
      "amount",
      amount,
    );
  }
  if (!allowNegative && amount < 0) {
    throw new InvalidInputError(
      `Order amount must not be negative: ${amount}`,
      "amount",
      amount,
    );
  }
}
