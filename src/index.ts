// Public API

export type { IStrategy } from "@/core/interfaces/IStrategy";
export {
  STRATEGY_ERROR_CODES,
  StrategyDispatchError,
  InvalidInputError,
  StrategyNotFoundError,
  MissingStrategyError,
  StrategyConfigError,
  isStrategyDispatchError,
  isStrategyNotFoundError,
  isInvalidInputError,
} from "@/core/errors/StrategyErrors";
export type { StrategyErrorCode } from "@/core/errors/StrategyErrors";

export { StrategyRegistry } from "@/services/StrategyRegistry";
export type { StrategyRegistryEntryInfo } from "@/services/StrategyRegistry";
export { StrategyDispatcher } from "@/services/StrategyDispatcher";
export { KeyedStrategyDispatcher } from "@/services/KeyedStrategyDispatcher";

export {
  DISCOUNT_STRATEGY_TYPES,
  isDiscountStrategyType,
} from "@/core/domain/DiscountStrategyType";
export type { DiscountStrategyType } from "@/core/domain/DiscountStrategyType";
export type {
  DiscountStrategyDefinition,
  DiscountStrategyFile,
} from "@/core/domain/DiscountStrategyConfig";
export type {
  DiscountStrategy,
  DiscountStrategyOptions,
} from "@/strategies/discount/types";
export { PercentageDiscountStrategy } from "@/strategies/discount/PercentageDiscountStrategy";
export { FixedDiscountStrategy } from "@/strategies/discount/FixedDiscountStrategy";
export { createDiscountStrategy } from "@/strategies/discount/DiscountStrategyFactory";

export {
  parseStrategyConfig,
  loadStrategyConfig,
} from "@/config/StrategyConfigLoader";
export {
  createDiscountRegistry,
  loadDiscountRegistry,
  loadDiscountDispatcher,
} from "@/bootstrap";
export type { DiscountRegistry } from "@/bootstrap";
