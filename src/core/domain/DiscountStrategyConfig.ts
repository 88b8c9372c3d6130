/**
 * 할인 전략 정의 Zod 스키마
 *
 * YAML 전략 정의 파일 검증용
 *
 * @example
 * strategies:
 *   - key: percentage
 *     type: percentage
 *     rate: 0.1
 *   - key: fixed
 *     type: fixed
 *     amount: 15
 */

import { z } from "zod";
import { DISCOUNT_STRATEGY_TYPES } from "./DiscountStrategyType";

const StrategyKeySchema = z.string().trim().min(1, "key is required");

/**
 * 정률 할인 정의
 */
export const PercentageDiscountDefinitionSchema = z.object({
  key: StrategyKeySchema,
  type: z.literal(DISCOUNT_STRATEGY_TYPES.PERCENTAGE),
  /** 할인율 (0 ~ 1) */
  rate: z.number().min(0).max(1),
  allow_negative: z.boolean().default(false),
});

/**
 * 정액 할인 정의
 */
export const FixedDiscountDefinitionSchema = z.object({
  key: StrategyKeySchema,
  type: z.literal(DISCOUNT_STRATEGY_TYPES.FIXED),
  /** 고정 할인 금액 */
  amount: z.number().nonnegative(),
  allow_negative: z.boolean().default(false),
});

export const DiscountStrategyDefinitionSchema = z.discriminatedUnion("type", [
  PercentageDiscountDefinitionSchema,
  FixedDiscountDefinitionSchema,
]);

/**
 * 전략 정의 파일 스키마 (키 중복 불가)
 */
export const DiscountStrategyFileSchema = z
  .object({
    strategies: z.array(DiscountStrategyDefinitionSchema),
  })
  .superRefine((file, ctx) => {
    const seen = new Set<string>();
    file.strategies.forEach((definition, index) => {
      if (seen.has(definition.key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["strategies", index, "key"],
          message: `Duplicate strategy key: ${definition.key}`,
        });
      }
      seen.add(definition.key);
    });
  });

export type PercentageDiscountDefinition = z.infer<
  typeof PercentageDiscountDefinitionSchema
>;
export type FixedDiscountDefinition = z.infer<
  typeof FixedDiscountDefinitionSchema
>;
export type DiscountStrategyDefinition = z.infer<
  typeof DiscountStrategyDefinitionSchema
>;
export type DiscountStrategyFile = z.infer<typeof DiscountStrategyFileSchema>;
