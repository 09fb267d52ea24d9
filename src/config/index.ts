import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../util/errors.js';
import { envString } from '../util/env.js';

const weightsSchema = z.object({
  paymentHistory: z.number().min(0),
  loanCount: z.number().min(0),
  currentActivity: z.number().min(0),
  volume: z.number().min(0),
}).strict().refine(
  (w) => Math.abs(w.paymentHistory + w.loanCount + w.currentActivity + w.volume - 100) < 1e-9,
  { message: 'score weights must sum to 100' },
);

const bandSchema = z.object({
  above: z.number().int().min(0).max(100),
  floorRate: z.number().min(0).nullable(),
}).strict();

export const policySchema = z.object({
  weights: weightsSchema,
  loanCountPenalty: z.number().min(0),
  activityPenalty: z.number().min(0),
  bands: z.array(bandSchema).min(1).refine(
    (bands) => bands.every((b, i) => i === 0 || b.above < bands[i - 1].above),
    { message: 'bands must be ordered by descending score threshold' },
  ),
  rateCorrection: z.enum(['raise', 'reject']),
  maxBurdenRatio: z.number().positive().max(1),
  limitMultiplier: z.number().positive(),
  limitRoundingUnit: z.number().int().positive(),
}).strict();

const storageSchema = z.object({
  dbPath: z.string().min(1),
}).strict();

export type ScoreWeights = z.infer<typeof weightsSchema>;
export type RateBand = z.infer<typeof bandSchema>;
export type Policy = z.infer<typeof policySchema>;
export type StorageConfig = z.infer<typeof storageSchema>;

export type AppConfig = {
  policy: Policy;
  storage: StorageConfig;
};

export const DEFAULT_POLICY: Policy = {
  weights: { paymentHistory: 30, loanCount: 20, currentActivity: 20, volume: 30 },
  loanCountPenalty: 10,
  activityPenalty: 20,
  bands: [
    { above: 50, floorRate: null },
    { above: 30, floorRate: 12 },
    { above: 10, floorRate: 16 },
  ],
  rateCorrection: 'raise',
  maxBurdenRatio: 0.5,
  limitMultiplier: 36,
  limitRoundingUnit: 100_000,
};

const fileSchema = z.object({
  policy: policySchema.partial().optional(),
  storage: storageSchema.partial().optional(),
}).strict();

let cfg: AppConfig | null = null;

export function configFilePath(): string {
  return path.resolve(process.cwd(), envString('CREDIT_CONFIG', path.join('config', 'config.json')));
}

// For testing: reset the cache
export function resetConfigCache() {
  cfg = null;
}

/**
 * Merge a raw config document over the defaults. Sections may be partial;
 * the merged policy is validated as a whole so cross-field rules still apply.
 */
export function parseConfig(raw: unknown): AppConfig {
  const file = fileSchema.safeParse(raw ?? {});
  if (!file.success) throw new ConfigError(`invalid config: ${file.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);

  const policy = policySchema.safeParse({ ...DEFAULT_POLICY, ...file.data.policy });
  if (!policy.success) throw new ConfigError(`invalid policy: ${policy.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);

  const storage = {
    dbPath: envString('DATA_DB_PATH', file.data.storage?.dbPath ?? './data/credit.db'),
  };
  return { policy: policy.data, storage };
}

export function loadConfig(file: string = configFilePath()): AppConfig {
  if (!fs.existsSync(file)) return parseConfig({});
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (err) {
    throw new ConfigError(`could not read ${file}`, { cause: err });
  }
  return parseConfig(raw);
}

export function getConfig(): AppConfig {
  if (!cfg) cfg = loadConfig();
  return cfg;
}
