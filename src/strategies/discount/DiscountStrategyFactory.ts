/**
 * Discount Strategy Factory
 *
 * SOLID 원칙:
 * - SRP: 전략 정의 → 전략 인스턴스 생성만 담당
 * - OCP: 새 할인 타입은 builder 테이블에 한 줄 추가
 *
 * Note: 타입별 분기 대신 builder 테이블 조회
 */

import { DiscountStrategyType } from "@/core/domain/DiscountStrategyType";
import {
  DiscountStrategyDefinition,
  FixedDiscountDefinition,
  PercentageDiscountDefinition,
} from "@/core/domain/DiscountStrategyConfig";
import { DiscountStrategy } from "./types";
import { PercentageDiscountStrategy } from "./PercentageDiscountStrategy";
import { FixedDiscountStrategy } from "./FixedDiscountStrategy";

/**
 * 타입별 정의 매핑
 */
type DefinitionByType = {
  percentage: PercentageDiscountDefinition;
  fixed: FixedDiscountDefinition;
};

type DiscountStrategyBuilders = {
  [K in DiscountStrategyType]: (
    definition: DefinitionByType[K],
  ) => DiscountStrategy;
};

const BUILDERS: DiscountStrategyBuilders = {
  percentage: (definition) =>
    new PercentageDiscountStrategy(definition.rate, {
      allowNegative: definition.allow_negative,
    }),
  fixed: (definition) =>
    new FixedDiscountStrategy(definition.amount, {
      allowNegative: definition.allow_negative,
    }),
};

/**
 * 정의로부터 할인 전략 생성
 */
export function createDiscountStrategy(
  definition: DiscountStrategyDefinition,
): DiscountStrategy {
  return build(definition.type, definition);
}

function build<K extends DiscountStrategyType>(
  type: K,
  definition: DefinitionByType[K],
): DiscountStrategy {
  return BUILDERS[type](definition);
}
