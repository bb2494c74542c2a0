import {
  type HarvestConfig,
  harvestCaps,
  resolveHarvestConfig
} from "../../application/harvest/harvest.config";
import { type DateMode, isDateMode } from "../../core/date/dateRange";

export const runtimeCaps = {
  timeoutMs: { min: 1000, max: 60000 },
  chatBatchSize: { min: 1, max: 500 }
} as const;

export type RuntimeConfig = {
  harvestConfig: HarvestConfig;
  timeoutMs: number;
  includeLates: boolean;
  chatBatchSize: number;
  dateMode: DateMode;
  customStart?: string;
  customEnd?: string;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const parseOptionalFlag = (env: NodeJS.ProcessEnv, name: string): boolean | undefined => {
  const raw = env[name]?.trim().toLowerCase();
  if (raw == null || raw === "") return undefined;
  if (raw === "1" || raw === "true") return true;
  if (raw === "0" || raw === "false") return false;
  throw new Error(`${name}=${env[name]} must be one of 1, true, 0, false`);
};

const parseDateMode = (env: NodeJS.ProcessEnv): DateMode => {
  const raw = env.HARVEST_DATE_MODE?.trim();
  if (raw == null || raw === "") return "today";
  if (!isDateMode(raw)) {
    throw new Error(`HARVEST_DATE_MODE=${raw} must be one of today, yesterday, last_7_days, last_30_days, custom`);
  }
  return raw;
};

const optionalTrimmed = (value: string | undefined): string | undefined =>
  value?.trim() ? value.trim() : undefined;

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const harvestConfig = resolveHarvestConfig({
    initialConcurrency: parseOptionalIntInRange(env, "HARVEST_INITIAL_CONCURRENCY", harvestCaps.concurrency),
    minConcurrency: parseOptionalIntInRange(env, "HARVEST_MIN_CONCURRENCY", harvestCaps.concurrency),
    maxConcurrency: parseOptionalIntInRange(env, "HARVEST_MAX_CONCURRENCY", harvestCaps.concurrency),
    workerPoolSize: parseOptionalIntInRange(env, "HARVEST_POOL_SIZE", harvestCaps.workerPoolSize),
    autoConcurrencyEnabled: parseOptionalFlag(env, "HARVEST_AUTO_CONCURRENCY"),
    cpuUpperThreshold: parseOptionalIntInRange(env, "HARVEST_CPU_UPPER", harvestCaps.percent),
    cpuLowerThreshold: parseOptionalIntInRange(env, "HARVEST_CPU_LOWER", harvestCaps.percent),
    memUpperThreshold: parseOptionalIntInRange(env, "HARVEST_MEM_UPPER", harvestCaps.percent),
    checkIntervalSeconds: parseOptionalIntInRange(env, "HARVEST_CHECK_INTERVAL_SECONDS", harvestCaps.checkIntervalSeconds),
    cooldownSeconds: parseOptionalIntInRange(env, "HARVEST_COOLDOWN_SECONDS", harvestCaps.cooldownSeconds),
    workerRetryCount: parseOptionalIntInRange(env, "HARVEST_RETRY_COUNT", harvestCaps.workerRetryCount),
    numSubmissionWorkers: parseOptionalIntInRange(env, "HARVEST_SUBMISSION_WORKERS", harvestCaps.numSubmissionWorkers),
    prioritizeByPriorInf: parseOptionalFlag(env, "HARVEST_PRIORITIZE_BY_INF")
  });

  const dateMode = parseDateMode(env);
  const customStart = optionalTrimmed(env.HARVEST_START_DATE);
  const customEnd = optionalTrimmed(env.HARVEST_END_DATE);
  if (dateMode === "custom" && (customStart === undefined || customEnd === undefined)) {
    throw new Error("HARVEST_START_DATE and HARVEST_END_DATE are required when HARVEST_DATE_MODE=custom");
  }

  return {
    harvestConfig,
    timeoutMs: parseOptionalIntInRange(env, "PORTAL_TIMEOUT_MS", runtimeCaps.timeoutMs) ?? 15000,
    includeLates: parseOptionalFlag(env, "PORTAL_INCLUDE_LATES") ?? false,
    chatBatchSize: parseOptionalIntInRange(env, "HARVEST_CHAT_BATCH_SIZE", runtimeCaps.chatBatchSize) ?? 100,
    dateMode,
    customStart,
    customEnd
  };
};
