/**
 * YAML 전략 정의 로더
 *
 * SOLID 원칙:
 * - SRP: 전략 정의 파일 로드/검증만 담당
 * - OCP: 새 전략은 YAML에 항목 추가
 *
 * 검증 실패 시 StrategyConfigError (path: message 목록 포함)
 */

import * as fs from "fs";
import * as yaml from "js-yaml";
import type { ZodIssue } from "zod";
import {
  DiscountStrategyFile,
  DiscountStrategyFileSchema,
} from "@/core/domain/DiscountStrategyConfig";
import { StrategyConfigError } from "@/core/errors/StrategyErrors";
import { STRATEGY_CONFIG } from "./constants";
import { logger } from "./logger";

/**
 * YAML 문자열 파싱 + 스키마 검증
 * @param source 에러 메시지용 출처 (파일 경로 등)
 */
export function parseStrategyConfig(
  content: string,
  source = "<inline>",
): DiscountStrategyFile {
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    throw new StrategyConfigError(`Invalid YAML in ${source}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  const result = DiscountStrategyFileSchema.safeParse(raw);
  if (!result.success) {
    throw new StrategyConfigError(
      `Invalid strategy config in ${source}`,
      result.error.issues.map(formatIssue),
    );
  }

  return result.data;
}

/**
 * 전략 정의 파일 로드
 * @param configPath 기본값: STRATEGY_CONFIG_PATH 또는 config/strategies/discount.yaml
 */
export function loadStrategyConfig(
  configPath: string = STRATEGY_CONFIG.CONFIG_PATH,
): DiscountStrategyFile {
  if (!fs.existsSync(configPath)) {
    throw new StrategyConfigError(`Config file not found: ${configPath}`);
  }

  const content = fs.readFileSync(configPath, "utf8");
  const config = parseStrategyConfig(content, configPath);

  logger.debug(
    { configPath, count: config.strategies.length },
    "전략 정의 로드 완료",
  );

  return config;
}

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}
