/**
 * Keyed Strategy Dispatcher
 *
 * 키 기반 분기(if type === "...")를 레지스트리 조회로 대체한 Coordinator
 *
 * SOLID 원칙:
 * - OCP: 새 전략은 레지스트리 등록만으로 추가
 * - DIP: StrategyRegistry 주입
 */

import { StrategyRegistry } from "./StrategyRegistry";
import { StrategyDispatcher } from "./StrategyDispatcher";
import {
  MissingStrategyError,
  isStrategyNotFoundError,
} from "@/core/errors/StrategyErrors";
import { IStrategy } from "@/core/interfaces/IStrategy";

export class KeyedStrategyDispatcher<
  TInput,
  TOutput,
  TKey extends string = string,
> {
  private readonly registry: StrategyRegistry<TInput, TOutput, TKey>;

  constructor(
    registry: StrategyRegistry<TInput, TOutput, TKey> | null | undefined,
  ) {
    if (registry === null || registry === undefined) {
      throw new MissingStrategyError(
        "KeyedStrategyDispatcher requires a strategy registry",
      );
    }
    this.registry = registry;
  }

  /**
   * 키로 전략 조회 후 실행
   * @throws StrategyNotFoundError 미등록 키
   */
  dispatch(key: TKey, input: TInput): TOutput {
    return this.registry.resolve(key).apply(input);
  }

  /**
   * 키로 전략을 한 번 조회해 새 Dispatcher에 바인딩
   */
  bind(key: TKey): StrategyDispatcher<TInput, TOutput> {
    return new StrategyDispatcher(this.registry.resolve(key));
  }

  /**
   * 미등록 키일 때만 fallbackKey 전략으로 실행
   * 입력값 에러는 fallback 대상 아님 (그대로 전파)
   */
  dispatchOrFallback(key: TKey, input: TInput, fallbackKey: TKey): TOutput {
    return this.resolveOrFallback(key, fallbackKey).apply(input);
  }

  private resolveOrFallback(
    key: TKey,
    fallbackKey: TKey,
  ): IStrategy<TInput, TOutput> {
    try {
      return this.registry.resolve(key);
    } catch (error) {
      if (isStrategyNotFoundError(error)) {
        return this.registry.resolve(fallbackKey);
      }
      throw error;
    }
  }
}
