/**
 * Composition Root
 *
 * 전략 정의 → 전략 인스턴스 생성 → 레지스트리 등록
 * 레지스트리는 여기서 생성해 호출자에게 넘김 (전역 상태 없음)
 */

import { DiscountStrategyDefinition } from "@/core/domain/DiscountStrategyConfig";
import { loadStrategyConfig } from "@/config/StrategyConfigLoader";
import { StrategyRegistry } from "@/services/StrategyRegistry";
import { KeyedStrategyDispatcher } from "@/services/KeyedStrategyDispatcher";
import { createDiscountStrategy } from "@/strategies/discount/DiscountStrategyFactory";
import { logger } from "@/config/logger";

export type DiscountRegistry = StrategyRegistry<number, number>;

/**
 * 정의 목록으로 할인 전략 레지스트리 구성
 */
export function createDiscountRegistry(
  definitions: readonly DiscountStrategyDefinition[],
): DiscountRegistry {
  const registry: DiscountRegistry = new StrategyRegistry();

  for (const definition of definitions) {
    registry.register(definition.key, createDiscountStrategy(definition));
  }

  logger.info(
    { keys: Array.from(registry.keys()) },
    "할인 전략 레지스트리 구성 완료",
  );

  return registry;
}

/**
 * YAML 전략 정의 파일로 레지스트리 구성
 */
export function loadDiscountRegistry(configPath?: string): DiscountRegistry {
  const config = loadStrategyConfig(configPath);
  return createDiscountRegistry(config.strategies);
}

/**
 * YAML 전략 정의 파일로 키 기반 Dispatcher 구성
 */
export function loadDiscountDispatcher(
  configPath?: string,
): KeyedStrategyDispatcher<number, number> {
  return new KeyedStrategyDispatcher(loadDiscountRegistry(configPath));
}
