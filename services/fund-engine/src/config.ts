import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  IRR_MAX_ITERATIONS: z.coerce.number().int().positive().default(100),
  IRR_TOLERANCE: z.coerce.number().positive().default(1e-6),
  IRR_INITIAL_GUESS: z.coerce.number().gt(-0.99).lt(10).default(0.1),
  DEFAULT_PROJECTION_QUARTERS: z.coerce.number().int().positive().default(20),
  MANAGEMENT_FEE_RATE: z.coerce.number().min(0).max(1).default(0.02),
  // In a deployed image contracts can live outside the repo
  CONTRACTS_DIR: z.string().min(1).optional(),
});

export interface EngineConfig {
  logLevel: LogLevel;
  irr: {
    maxIterations: number;
    tolerance: number;
    initialGuess: number;
  };
  defaultProjectionQuarters: number;
  managementFeeRate: number;
  contractsDir: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid engine configuration: ${details}`);
  }

  const values = parsed.data;
  return {
    logLevel: values.LOG_LEVEL,
    irr: {
      maxIterations: values.IRR_MAX_ITERATIONS,
      tolerance: values.IRR_TOLERANCE,
      initialGuess: values.IRR_INITIAL_GUESS,
    },
    defaultProjectionQuarters: values.DEFAULT_PROJECTION_QUARTERS,
    managementFeeRate: values.MANAGEMENT_FEE_RATE,
    contractsDir: values.CONTRACTS_DIR ?? path.resolve(__dirname, "..", "..", "..", "contracts"),
  };
}

let cached: EngineConfig | null = null;

export function getConfig(): EngineConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}
