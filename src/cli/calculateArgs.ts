/**
 * calculate-discount 인자 파싱
 *
 * 형식: <strategy-key> <order-amount> [--config <path>]
 * - 잘못된 인자는 기본값으로 대체하지 않고 null 반환 (usage 출력 대상)
 * - 숫자가 아닌 금액은 NaN 그대로 전달 (전략이 InvalidInputError 발생)
 */

export interface CalculateArgs {
  key: string;
  amount: number;
  configPath?: string;
}

export const CALCULATE_USAGE =
  "Usage: calculate-discount <strategy-key> <order-amount> [--config <path>]";

export function parseCalculateArgs(args: string[]): CalculateArgs | null {
  const positional: string[] = [];
  let configPath: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--config") {
      const value = args[i + 1];
      if (value === undefined || isBlank(value) || value.startsWith("-")) {
        return null;
      }
      configPath = value;
      i++;
    } else {
      positional.push(arg);
    }
  }

  if (positional.length !== 2) return null;

  const [key, amountArg] = positional;
  if (isBlank(key) || isBlank(amountArg)) return null;

  return { key, amount: Number(amountArg), configPath };
}

function isBlank(value: string): boolean {
  return value.trim().length === 0;
}
