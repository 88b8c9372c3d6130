/**
 * 로거 설정
 * Pino 기반 로깅 시스템
 *
 * 출력:
 * - 기본: 구조화된 JSON (stderr, LOG_DESTINATION=stdout이면 stdout)
 * - LOG_PRETTY=true: 색상 포맷 (stderr)
 *
 * 테스트 환경(NODE_ENV=test)에서는 LOG_LEVEL 미지정 시 silent
 */

import pino from "pino";
import type { DestinationStream } from "pino";
import { LOG_CONFIG, APP_METADATA } from "./constants";
import { getTimestampWithTimezone } from "@/utils/timestamp";

/**
 * Pino 로그 레벨 상수
 */
const LOG_LEVELS = {
  TRACE: 10,
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
  FATAL: 60,
} as const;

/**
 * 로거 생성 옵션
 */
export interface LoggerOptions {
  level: string;
  pretty: boolean;
  /** JSON 출력 대상 (기본값: LOG_CONFIG.DESTINATION_FD) */
  destination?: DestinationStream;
}

/**
 * 레벨 숫자 → 색상/라벨
 */
function describeLevel(level: number): { color: string; label: string } {
  if (level >= LOG_LEVELS.ERROR) return { color: "\x1b[31m", label: "ERROR" };
  if (level >= LOG_LEVELS.WARN) return { color: "\x1b[33m", label: "WARN" };
  if (level >= LOG_LEVELS.INFO) return { color: "\x1b[32m", label: "INFO" };
  return { color: "\x1b[90m", label: "DEBUG" };
}

/**
 * Error는 enumerable 필드가 없으므로 pino err serializer로 변환
 */
function serializeValue(value: unknown): unknown {
  return value instanceof Error ? pino.stdSerializers.err(value) : value;
}

/**
 * Pino 호출 인자 → 로그 객체
 * 형식: logger.info(msg) / logger.info(obj, msg) / logger.error(err, msg?)
 */
export function toLogObject(inputArgs: unknown[]): Record<string, unknown> {
  const [first, second] = inputArgs;
  const logObj: Record<string, unknown> = {};

  if (typeof first === "string") {
    logObj.msg = first;
    return logObj;
  }

  if (first instanceof Error) {
    logObj.msg = typeof second === "string" ? second : first.message;
    logObj.err = serializeValue(first);
    return logObj;
  }

  if (typeof first === "object" && first !== null) {
    for (const [field, value] of Object.entries(first)) {
      logObj[field] = serializeValue(value);
    }
    if (typeof second === "string") {
      logObj.msg = second;
    }
  }

  return logObj;
}

/**
 * 개발 환경용 콘솔 포맷 (색상 + 필드 나열)
 * @returns 출력할 줄 목록
 */
export function formatPrettyLines(
  logObj: Record<string, unknown>,
  level: number,
  now: Date = new Date(),
): string[] {
  const time = getTimestampWithTimezone(now).slice(11, 19);
  const { color, label } = describeLevel(level);
  const msg = typeof logObj.msg === "string" ? logObj.msg : "";

  const lines = [`[${time}] ${color}${label}\x1b[0m \x1b[36m${msg}\x1b[0m`];

  for (const [field, value] of Object.entries(logObj)) {
    if (field === "msg") continue;
    const rendered =
      typeof value === "object" ? JSON.stringify(value) : String(value);
    lines.push(`  ${field}: ${rendered}`);
  }

  return lines;
}

/**
 * Pretty 출력 Hook (JSON 출력 대신 콘솔 포맷만 출력)
 */
const prettyHooks: pino.LoggerOptions["hooks"] = {
  logMethod(inputArgs, _method, level) {
    for (const line of formatPrettyLines(toLogObject(inputArgs), level)) {
      console.error(line);
    }
  },
};

/**
 * 로거 생성
 */
export function createLogger(options: LoggerOptions): pino.Logger {
  const baseConfig: pino.LoggerOptions = {
    level: options.level,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: () => `,"time":"${getTimestampWithTimezone()}"`,
    base: {
      service: APP_METADATA.SERVICE,
      env: LOG_CONFIG.NODE_ENV,
    },
  };

  if (options.pretty) {
    return pino({ ...baseConfig, hooks: prettyHooks });
  }

  return pino(
    baseConfig,
    options.destination ?? pino.destination(LOG_CONFIG.DESTINATION_FD),
  );
}

/**
 * 메인 로거 인스턴스
 */
const logger: pino.Logger = createLogger({
  level: LOG_CONFIG.LEVEL,
  pretty: LOG_CONFIG.PRETTY,
});

export { logger };
