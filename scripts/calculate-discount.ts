/**
 * 할인 금액 계산 스크립트
 *
 * 사용법:
 *   npx tsx scripts/calculate-discount.ts <strategy-key> <order-amount> [--config <path>]
 *
 * 예:
 *   npx tsx scripts/calculate-discount.ts percentage 100   → 10
 *   npx tsx scripts/calculate-discount.ts fixed 100        → 15
 *
 * 결과는 stdout, 로그는 stderr
 */

import "dotenv/config";

import { loadDiscountDispatcher } from "@/bootstrap";
import { CALCULATE_USAGE, parseCalculateArgs } from "@/cli/calculateArgs";
import { isStrategyDispatchError } from "@/core/errors/StrategyErrors";
import { logger } from "@/config/logger";

function main(): void {
  const args = process.argv.slice(2);

  if (args.includes("--help") || args.includes("-h")) {
    console.log(CALCULATE_USAGE);
    return;
  }

  const parsed = parseCalculateArgs(args);
  if (!parsed) {
    console.error(CALCULATE_USAGE);
    process.exit(1);
  }

  try {
    const dispatcher = loadDiscountDispatcher(parsed.configPath);
    const discount = dispatcher.dispatch(parsed.key, parsed.amount);
    console.log(discount);
  } catch (error) {
    if (isStrategyDispatchError(error)) {
      logger.error({ code: error.code }, error.message);
    } else {
      logger.error(
        { err: error instanceof Error ? error : String(error) },
        "할인 계산 실패",
      );
    }
    process.exit(1);
  }
}

main();
