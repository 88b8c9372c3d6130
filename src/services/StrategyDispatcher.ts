/**
 * Strategy Dispatcher (Coordinator)
 *
 * SOLID 원칙:
 * - SRP: 바인딩된 전략에 호출 위임만 담당
 * - OCP: 새 전략 추가 시 Dispatcher 수정 불필요
 * - DIP: 전략은 외부에서 주입 (내부 생성 금지)
 *
 * 동작:
 * - process(input) → strategy.apply(input) 결과를 그대로 반환
 * - 전략 타입 검사/분기 없음, 에러 변환 없음
 * - 전략 없이 생성하면 즉시 MissingStrategyError (fail fast)
 */

import { IStrategy } from "@/core/interfaces/IStrategy";
import { MissingStrategyError } from "@/core/errors/StrategyErrors";

export class StrategyDispatcher<TInput, TOutput> {
  private strategy: IStrategy<TInput, TOutput>;

  constructor(strategy: IStrategy<TInput, TOutput> | null | undefined) {
    this.strategy = StrategyDispatcher.requireStrategy(strategy);
  }

  /**
   * 바인딩된 전략 실행
   */
  process(input: TInput): TOutput {
    return this.strategy.apply(input);
  }

  /**
   * 전략 교체 (이후 호출부터 적용)
   * @throws MissingStrategyError 전략이 없는 경우
   */
  setStrategy(strategy: IStrategy<TInput, TOutput> | null | undefined): void {
    this.strategy = StrategyDispatcher.requireStrategy(strategy);
  }

  /**
   * 현재 바인딩된 전략
   */
  getStrategy(): IStrategy<TInput, TOutput> {
    return this.strategy;
  }

  private static requireStrategy<I, O>(
    strategy: IStrategy<I, O> | null | undefined,
  ): IStrategy<I, O> {
    if (strategy === null || strategy === undefined) {
      throw new MissingStrategyError("StrategyDispatcher requires a strategy");
    }
    return strategy;
  }
}
