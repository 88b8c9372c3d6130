/**
 * StrategyRegistry 단위 테스트
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import { StrategyRegistry } from "@/services/StrategyRegistry";
import { IStrategy } from "@/core/interfaces/IStrategy";
import {
  InvalidInputError,
  MissingStrategyError,
  StrategyNotFoundError,
} from "@/core/errors/StrategyErrors";

const createStrategy = (
  type: string,
  apply: (input: number) => number,
): IStrategy<number, number> => ({
  type,
  name: `${type}-strategy`,
  apply,
});

describe("StrategyRegistry", () => {
  let registry: StrategyRegistry<number, number>;

  beforeEach(() => {
    registry = new StrategyRegistry();
  });

  describe("register / resolve", () => {
    it("등록한 인스턴스를 그대로 반환", () => {
      const strategy = createStrategy("double", (x) => x * 2);
      registry.register("double", strategy);

      expect(registry.resolve("double")).toBe(strategy);
    });

    it("같은 키 재등록 시 마지막 전략으로 덮어씀", () => {
      const first = createStrategy("first", () => 1);
      const second = createStrategy("second", () => 2);

      registry.register("k", first);
      registry.register("k", second);

      expect(registry.resolve("k")).toBe(second);
      expect(registry.size()).toBe(1);
    });

    it("같은 키, 같은 전략 반복 등록 허용", () => {
      const strategy = createStrategy("same", (x) => x);

      registry.register("same", strategy);
      registry.register("same", strategy);

      expect(registry.resolve("same")).toBe(strategy);
    });

    it("하나의 전략을 여러 키로 공유 가능", () => {
      const strategy = createStrategy("shared", (x) => x);

      registry.register("a", strategy);
      registry.register("b", strategy);

      expect(registry.resolve("a")).toBe(registry.resolve("b"));
    });
  });

  describe("resolve - 미등록 키", () => {
    it("StrategyNotFoundError 발생", () => {
      registry.register("known", createStrategy("known", (x) => x));

      expect(() => registry.resolve("unknown")).toThrow(StrategyNotFoundError);
    });

    it("에러에 키와 등록된 키 목록 포함", () => {
      registry.register("a", createStrategy("a", (x) => x));
      registry.register("b", createStrategy("b", (x) => x));

      try {
        registry.resolve("missing");
        throw new Error("resolve should have thrown");
      } catch (error) {
        expect(error).toBeInstanceOf(StrategyNotFoundError);
        if (error instanceof StrategyNotFoundError) {
          expect(error.key).toBe("missing");
          expect(error.availableKeys).toEqual(["a", "b"]);
          expect(error.code).toBe("STRATEGY_NOT_FOUND");
          expect(error.message).toBe(
            "Unknown strategy: missing. Available strategies: a, b",
          );
        }
      }
    });

    it("빈 레지스트리는 (none) 표시", () => {
      expect(() => registry.resolve("x")).toThrow(
        "Unknown strategy: x. Available strategies: (none)",
      );
    });
  });

  describe("register - 입력 검증", () => {
    it("빈 키는 InvalidInputError", () => {
      expect(() =>
        registry.register("  ", createStrategy("blank", (x) => x)),
      ).toThrow(InvalidInputError);
    });

    it("전략 null은 MissingStrategyError", () => {
      expect(() => registry.register("k", null)).toThrow(MissingStrategyError);
      expect(registry.has("k")).toBe(false);
    });

    it("전략 undefined는 MissingStrategyError", () => {
      expect(() => registry.register("k", undefined)).toThrow(
        MissingStrategyError,
      );
    });
  });

  describe("keys()", () => {
    it("등록된 키 집합 반환", () => {
      registry.register("percentage", createStrategy("p", (x) => x));
      registry.register("fixed", createStrategy("f", () => 15));

      expect(registry.keys()).toEqual(new Set(["percentage", "fixed"]));
    });

    it("반환된 집합은 스냅샷 (이후 등록에 영향 없음)", () => {
      registry.register("a", createStrategy("a", (x) => x));
      const snapshot = registry.keys();

      registry.register("b", createStrategy("b", (x) => x));

      expect(snapshot.size).toBe(1);
      expect(registry.keys().size).toBe(2);
    });
  });

  describe("has / unregister / size", () => {
    it("등록 해제 후 resolve 실패", () => {
      registry.register("a", createStrategy("a", (x) => x));

      expect(registry.has("a")).toBe(true);
      expect(registry.unregister("a")).toBe(true);
      expect(registry.has("a")).toBe(false);
      expect(() => registry.resolve("a")).toThrow(StrategyNotFoundError);
    });

    it("미등록 키 해제는 false", () => {
      expect(registry.unregister("nothing")).toBe(false);
    });

    it("size는 키 개수", () => {
      expect(registry.size()).toBe(0);
      registry.register("a", createStrategy("a", (x) => x));
      registry.register("b", createStrategy("b", (x) => x));
      expect(registry.size()).toBe(2);
    });
  });

  describe("getAvailableStrategies()", () => {
    it("키/타입/이름 목록 반환", () => {
      registry.register("ten", createStrategy("percentage", (x) => x * 0.1));

      expect(registry.getAvailableStrategies()).toEqual([
        { key: "ten", type: "percentage", name: "percentage-strategy" },
      ]);
    });
  });
});
