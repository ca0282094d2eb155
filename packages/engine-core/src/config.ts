import { z } from "zod";

export const MetricConfig = z.object({
  lo: z.number(),
  mid: z.number(),
  hi: z.number()
});

export const EngineConfig = z.object({
  charsPerLine: z.number().int().min(8).default(40),
  maxErrors: z.number().int().min(1).default(5),
  nextLines: z.number().int().min(1).default(3),
  refillThreshold: z.number().int().min(0).default(20),
  refillBatch: z.number().int().min(1).default(30),
  focusLetters: z.number().int().min(0).default(3),
  scoreLineEnd: z.boolean().default(true),
  metric: MetricConfig.default({ lo: 0.5, mid: 0.9, hi: 0.975 })
});

export type TEngineConfig = z.infer<typeof EngineConfig>;

export type EngineConfigInput = z.input<typeof EngineConfig>;

export function createConfig(overrides: EngineConfigInput = {}): TEngineConfig {
  return EngineConfig.parse(overrides);
}

export const DEFAULT_CONFIG: TEngineConfig = createConfig();
