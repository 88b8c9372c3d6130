/**
 * Strategy Dispatch 에러 정의
 *
 * 분류:
 * - INVALID_INPUT: 전략이 허용 범위 밖의 입력을 받음
 * - STRATEGY_NOT_FOUND: 등록되지 않은 키로 resolve
 * - MISSING_STRATEGY: 전략 없이 Dispatcher 바인딩 시도
 * - INVALID_STRATEGY_CONFIG: 전략 정의 파일 검증 실패
 *
 * Dispatch 코어는 에러를 잡거나 로깅하지 않음 (호출자에게 그대로 전파)
 */

/**
 * 에러 코드 상수
 */
export const STRATEGY_ERROR_CODES = {
  INVALID_INPUT: "INVALID_INPUT",
  STRATEGY_NOT_FOUND: "STRATEGY_NOT_FOUND",
  MISSING_STRATEGY: "MISSING_STRATEGY",
  INVALID_STRATEGY_CONFIG: "INVALID_STRATEGY_CONFIG",
} as const;

export type StrategyErrorCode =
  (typeof STRATEGY_ERROR_CODES)[keyof typeof STRATEGY_ERROR_CODES];

/**
 * 공통 베이스 에러
 */
export class StrategyDispatchError extends Error {
  constructor(
    message: string,
    public readonly code: StrategyErrorCode,
  ) {
    super(message);
    this.name = "StrategyDispatchError";
  }
}

/**
 * 입력값 검증 실패
 */
export class InvalidInputError extends StrategyDispatchError {
  constructor(
    message: string,
    public readonly field: string,
    public readonly value?: unknown,
  ) {
    super(message, STRATEGY_ERROR_CODES.INVALID_INPUT);
    this.name = "InvalidInputError";
  }
}

/**
 * 등록되지 않은 전략 키
 */
export class StrategyNotFoundError extends StrategyDispatchError {
  constructor(
    public readonly key: string,
    public readonly availableKeys: readonly string[],
  ) {
    super(
      `Unknown strategy: ${key}. Available strategies: ${
        availableKeys.length > 0 ? availableKeys.join(", ") : "(none)"
      }`,
      STRATEGY_ERROR_CODES.STRATEGY_NOT_FOUND,
    );
    this.name = "StrategyNotFoundError";
  }
}

/**
 * 바인딩할 전략 없음 (설정 오류)
 */
export class MissingStrategyError extends StrategyDispatchError {
  constructor(message = "A strategy must be provided") {
    super(message, STRATEGY_ERROR_CODES.MISSING_STRATEGY);
    this.name = "MissingStrategyError";
  }
}

/**
 * 전략 정의 파일 검증 실패
 */
export class StrategyConfigError extends StrategyDispatchError {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(
      issues.length > 0 ? `${message}: ${issues.join("; ")}` : message,
      STRATEGY_ERROR_CODES.INVALID_STRATEGY_CONFIG,
    );
    this.name = "StrategyConfigError";
  }
}

/**
 * Strategy Dispatch 에러 여부 확인
 */
export function isStrategyDispatchError(
  error: unknown,
): error is StrategyDispatchError {
  return error instanceof StrategyDispatchError;
}

/**
 * 미등록 키 에러 여부 확인 (fallback 판단용)
 */
export function isStrategyNotFoundError(
  error: unknown,
): error is StrategyNotFoundError {
  return error instanceof StrategyNotFoundError;
}

/**
 * 입력값 에러 여부 확인
 */
export function isInvalidInputError(
  error: unknown,
): error is InvalidInputError {
  return error instanceof InvalidInputError;
}
