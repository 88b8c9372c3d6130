/**
 * StrategyConfigLoader 단위 테스트
 */

import * as path from "path";
import { describe, it, expect } from "@jest/globals";
import {
  loadStrategyConfig,
  parseStrategyConfig,
} from "@/config/StrategyConfigLoader";
import { StrategyConfigError } from "@/core/errors/StrategyErrors";

const FIXTURES_DIR = path.join(__dirname, "..", "fixtures", "strategies");

const captureConfigError = (fn: () => unknown): StrategyConfigError => {
  try {
    fn();
  } catch (error) {
    if (error instanceof StrategyConfigError) return error;
    throw error;
  }
  throw new Error("expected StrategyConfigError");
};

describe("parseStrategyConfig", () => {
  it("정상 정의 파싱 + allow_negative 기본값 false", () => {
    const config = parseStrategyConfig(
      [
        "strategies:",
        "  - key: percentage",
        "    type: percentage",
        "    rate: 0.1",
        "  - key: fixed",
        "    type: fixed",
        "    amount: 15",
      ].join("\n"),
    );

    expect(config.strategies).toEqual([
      { key: "percentage", type: "percentage", rate: 0.1, allow_negative: false },
      { key: "fixed", type: "fixed", amount: 15, allow_negative: false },
    ]);
  });

  it("빈 strategies 배열 허용", () => {
    expect(parseStrategyConfig("strategies: []").strategies).toEqual([]);
  });

  it("잘못된 YAML은 StrategyConfigError", () => {
    const error = captureConfigError(() =>
      parseStrategyConfig("strategies: [", "broken.yaml"),
    );

    expect(error.code).toBe("INVALID_STRATEGY_CONFIG");
    expect(error.message.startsWith("Invalid YAML in broken.yaml")).toBe(true);
  });

  it("빈 문서는 (root) 이슈", () => {
    const error = captureConfigError(() => parseStrategyConfig(""));

    expect(error.issues).toHaveLength(1);
    expect(error.issues[0].startsWith("(root): ")).toBe(true);
  });

  it("rate 범위 초과는 필드 경로 포함", () => {
    const error = captureConfigError(() =>
      parseStrategyConfig(
        "strategies:\n  - key: big\n    type: percentage\n    rate: 1.5\n",
      ),
    );

    expect(error.issues).toHaveLength(1);
    expect(error.issues[0].startsWith("strategies.0.rate: ")).toBe(true);
  });

  it("빈 키는 거부", () => {
    const error = captureConfigError(() =>
      parseStrategyConfig(
        "strategies:\n  - key: ''\n    type: fixed\n    amount: 1\n",
      ),
    );

    expect(error.issues).toEqual(["strategies.0.key: key is required"]);
  });
});

describe("loadStrategyConfig", () => {
  it("fixture 파일 로드", () => {
    const config = loadStrategyConfig(path.join(FIXTURES_DIR, "valid.yaml"));

    expect(config.strategies.map((s) => s.key)).toEqual([
      "member",
      "refund",
      "coupon",
    ]);
    expect(config.strategies[1]).toEqual({
      key: "refund",
      type: "percentage",
      rate: 0.1,
      allow_negative: true,
    });
  });

  it("중복 키는 StrategyConfigError", () => {
    const error = captureConfigError(() =>
      loadStrategyConfig(path.join(FIXTURES_DIR, "duplicate-keys.yaml")),
    );

    expect(error.issues).toEqual([
      "strategies.1.key: Duplicate strategy key: percentage",
    ]);
  });

  it("지원하지 않는 type은 StrategyConfigError", () => {
    const error = captureConfigError(() =>
      loadStrategyConfig(path.join(FIXTURES_DIR, "unknown-type.yaml")),
    );

    expect(error.issues).toHaveLength(1);
    expect(error.issues[0].startsWith("strategies.0.type: ")).toBe(true);
  });

  it("파일이 없으면 StrategyConfigError", () => {
    const missing = path.join(FIXTURES_DIR, "missing.yaml");

    expect(() => loadStrategyConfig(missing)).toThrow(
      `Config file not found: ${missing}`,
    );
  });

  it("기본 경로는 config/strategies/discount.yaml", () => {
    const config = loadStrategyConfig();

    expect(config.strategies.map((s) => s.key)).toEqual([
      "percentage",
      "fixed",
      "seasonal",
    ]);
  });
});
