/**
 * Strategy Registry
 *
 * SOLID 원칙:
 * - SRP: 키 → 전략 인스턴스 매핑만 담당
 * - OCP: 새 전략 추가 시 register 호출만 추가 (레지스트리 코드 수정 없음)
 * - DIP: IStrategy 인터페이스에 의존
 *
 * 목적:
 * - 문자열 타입 기반 if/switch 분기를 키 조회 테이블로 대체
 * - 미등록 키는 기본값 없이 StrategyNotFoundError
 *
 * Note: Singleton 아님. Composition root에서 생성 후 주입
 */

import { IStrategy } from "@/core/interfaces/IStrategy";
import {
  InvalidInputError,
  MissingStrategyError,
  StrategyNotFoundError,
} from "@/core/errors/StrategyErrors";
import { logger } from "@/config/logger";

/**
 * 등록된 전략 정보 (조회용)
 */
export interface StrategyRegistryEntryInfo<TKey extends string = string> {
  key: TKey;
  type: string;
  name: string;
}

/**
 * Strategy Registry
 * - TInput/TOutput: 등록되는 전략의 입출력 타입
 * - TKey: 전략 키 타입 (문자열 리터럴 유니온 지정 가능)
 */
export class StrategyRegistry<TInput, TOutput, TKey extends string = string> {
  private strategies: Map<TKey, IStrategy<TInput, TOutput>> = new Map();

  /**
   * 전략 등록 (같은 키가 있으면 덮어씀)
   * @throws InvalidInputError 빈 키
   * @throws MissingStrategyError 전략이 없는 경우
   */
  register(
    key: TKey,
    strategy: IStrategy<TInput, TOutput> | null | undefined,
  ): void {
    if (typeof key !== "string" || key.trim().length === 0) {
      throw new InvalidInputError(
        "Strategy key must be a non-empty string",
        "key",
        key,
      );
    }
    if (strategy === null || strategy === undefined) {
      throw new MissingStrategyError(`No strategy provided for key: ${key}`);
    }

    const overwritten = this.strategies.has(key);
    this.strategies.set(key, strategy);

    logger.debug(
      { key, type: strategy.type, name: strategy.name, overwritten },
      overwritten ? "전략 덮어쓰기" : "전략 등록 완료",
    );
  }

  /**
   * 전략 조회
   * @returns 등록된 전략 인스턴스 (동일 참조)
   * @throws StrategyNotFoundError 미등록 키
   */
  resolve(key: TKey): IStrategy<TInput, TOutput> {
    const strategy = this.strategies.get(key);

    if (!strategy) {
      throw new StrategyNotFoundError(key, Array.from(this.strategies.keys()));
    }

    return strategy;
  }

  /**
   * 등록된 키 목록 (스냅샷)
   */
  keys(): ReadonlySet<TKey> {
    return new Set(this.strategies.keys());
  }

  /**
   * 키 존재 여부 확인
   */
  has(key: TKey): boolean {
    return this.strategies.has(key);
  }

  /**
   * 전략 등록 해제
   * @returns 제거 여부
   */
  unregister(key: TKey): boolean {
    const removed = this.strategies.delete(key);
    if (removed) {
      logger.debug({ key }, "전략 등록 해제");
    }
    return removed;
  }

  /**
   * 등록된 전략 개수
   */
  size(): number {
    return this.strategies.size;
  }

  /**
   * 등록된 전략 정보 목록
   */
  getAvailableStrategies(): Array<StrategyRegistryEntryInfo<TKey>> {
    return Array.from(this.strategies.entries()).map(([key, strategy]) => ({
      key,
      type: strategy.type,
      name: strategy.name,
    }));
  }
}
