/**
 * 애플리케이션 설정 상수
 *
 * 환경변수 기반 설정 관리
 * - 환경변수가 없으면 기본값 사용
 * - .env 로드는 엔트리포인트에서 담당 (import "dotenv/config")
 */

import path from "path";

const NODE_ENV = process.env.NODE_ENV || "development";

/**
 * 애플리케이션 메타데이터
 */
export const APP_METADATA = {
  SERVICE: "strategy_dispatch",
} as const;

/**
 * 로그 레벨 결정
 * LOG_LEVEL이 있으면 그대로, 없으면 test → silent, production → info, 그 외 → debug
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv): string {
  if (env.LOG_LEVEL) return env.LOG_LEVEL;

  const nodeEnv = env.NODE_ENV || "development";
  if (nodeEnv === "test") return "silent";
  if (nodeEnv === "production") return "info";
  return "debug";
}

/**
 * 로깅 설정
 */
export const LOG_CONFIG = {
  NODE_ENV,

  /**
   * 로그 레벨
   * 환경변수: LOG_LEVEL
   */
  LEVEL: resolveLogLevel(process.env),

  /**
   * 색상 콘솔 출력 여부
   * 환경변수: LOG_PRETTY
   */
  PRETTY: process.env.LOG_PRETTY === "true",

  /**
   * JSON 로그 출력 fd (stdout은 결과 출력용으로 비워 둠)
   * 환경변수: LOG_DESTINATION=stdout이면 1
   * 기본값: 2 (stderr)
   */
  DESTINATION_FD: process.env.LOG_DESTINATION === "stdout" ? 1 : 2,
} as const;

/**
 * 전략 정의 파일 설정
 */
export const STRATEGY_CONFIG = {
  /**
   * 할인 전략 정의 YAML 경로
   * 환경변수: STRATEGY_CONFIG_PATH
   * 기본값: <project>/config/strategies/discount.yaml
   */
  CONFIG_PATH:
    process.env.STRATEGY_CONFIG_PATH ||
    path.join(__dirname, "..", "..", "config", "strategies", "discount.yaml"),
} as const;
