/**
 * 할인 전략 타입 상수 및 타입
 *
 * SOLID 원칙:
 * - OCP: 새로운 할인 전략 추가 시 확장 가능
 * - DIP: 문자열 리터럴 대신 타입 안전한 상수 사용
 */

/**
 * 지원하는 할인 전략 타입 상수
 */
export const DISCOUNT_STRATEGY_TYPES = {
  PERCENTAGE: "percentage",
  FIXED: "fixed",
} as const;

/**
 * Discount Strategy Type (Union Type)
 */
export type DiscountStrategyType =
  (typeof DISCOUNT_STRATEGY_TYPES)[keyof typeof DISCOUNT_STRATEGY_TYPES];

/**
 * Discount Strategy Type 검증
 */
export function isDiscountStrategyType(
  value: string,
): value is DiscountStrategyType {
  return Object.values<string>(DISCOUNT_STRATEGY_TYPES).includes(value);
}
