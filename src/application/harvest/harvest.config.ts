export type HarvestConfig = {
  initialConcurrency: number;
  minConcurrency: number;
  maxConcurrency: number;
  /** Collection workers started; defaults to the initial concurrency. */
  workerPoolSize: number;
  autoConcurrencyEnabled: boolean;
  cpuUpperThreshold: number;
  cpuLowerThreshold: number;
  memUpperThreshold: number;
  checkIntervalSeconds: number;
  cooldownSeconds: number;
  workerRetryCount: number;
  retryBaseDelayMs: number;
  numSubmissionWorkers: number;
  failureRateThreshold: number;
  opsPerWorkerPerMinute: number;
  failureWindowSeconds: number;
  prioritizeByPriorInf: boolean;
};

export type HarvestConfigInput = Partial<HarvestConfig>;

export const defaultHarvestConfig: HarvestConfig = {
  initialConcurrency: 30,
  minConcurrency: 1,
  maxConcurrency: 30,
  workerPoolSize: 30,
  autoConcurrencyEnabled: false,
  cpuUpperThreshold: 90,
  cpuLowerThreshold: 65,
  memUpperThreshold: 90,
  checkIntervalSeconds: 5,
  cooldownSeconds: 15,
  workerRetryCount: 3,
  retryBaseDelayMs: 1000,
  numSubmissionWorkers: 2,
  failureRateThreshold: 0.05,
  opsPerWorkerPerMinute: 30,
  failureWindowSeconds: 60,
  prioritizeByPriorInf: false
};

export const harvestCaps = {
  concurrency: { min: 1, max: 200 },
  workerPoolSize: { min: 1, max: 200 },
  percent: { min: 0, max: 100 },
  checkIntervalSeconds: { min: 1, max: 3600 },
  cooldownSeconds: { min: 0, max: 3600 },
  workerRetryCount: { min: 1, max: 10 },
  retryBaseDelayMs: { min: 0, max: 60000 },
  numSubmissionWorkers: { min: 1, max: 20 },
  opsPerWorkerPerMinute: { min: 1, max: 10000 },
  failureWindowSeconds: { min: 1, max: 3600 }
} as const;

const assertIntegerInRange = (name: string, value: number, range: { min: number; max: number }) => {
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${range.min}..${range.max}]`);
  }
};

const assertNumberInRange = (name: string, value: number, range: { min: number; max: number }) => {
  if (!Number.isFinite(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${range.min}..${range.max}]`);
  }
};

export const validateHarvestConfig = (config: HarvestConfig): HarvestConfig => {
  assertIntegerInRange("initialConcurrency", config.initialConcurrency, harvestCaps.concurrency);
  assertIntegerInRange("minConcurrency", config.minConcurrency, harvestCaps.concurrency);
  assertIntegerInRange("maxConcurrency", config.maxConcurrency, harvestCaps.concurrency);
  assertIntegerInRange("workerPoolSize", config.workerPoolSize, harvestCaps.workerPoolSize);
  assertNumberInRange("cpuUpperThreshold", config.cpuUpperThreshold, harvestCaps.percent);
  assertNumberInRange("cpuLowerThreshold", config.cpuLowerThreshold, harvestCaps.percent);
  assertNumberInRange("memUpperThreshold", config.memUpperThreshold, harvestCaps.percent);
  assertIntegerInRange("checkIntervalSeconds", config.checkIntervalSeconds, harvestCaps.checkIntervalSeconds);
  assertIntegerInRange("cooldownSeconds", config.cooldownSeconds, harvestCaps.cooldownSeconds);
  assertIntegerInRange("workerRetryCount", config.workerRetryCount, harvestCaps.workerRetryCount);
  assertIntegerInRange("retryBaseDelayMs", config.retryBaseDelayMs, harvestCaps.retryBaseDelayMs);
  assertIntegerInRange("numSubmissionWorkers", config.numSubmissionWorkers, harvestCaps.numSubmissionWorkers);
  assertNumberInRange("failureRateThreshold", config.failureRateThreshold, { min: 0, max: 1 });
  assertIntegerInRange("opsPerWorkerPerMinute", config.opsPerWorkerPerMinute, harvestCaps.opsPerWorkerPerMinute);
  assertIntegerInRange("failureWindowSeconds", config.failureWindowSeconds, harvestCaps.failureWindowSeconds);

  if (config.minConcurrency > config.maxConcurrency) {
    throw new Error(
      `minConcurrency=${config.minConcurrency} must not exceed maxConcurrency=${config.maxConcurrency}`
    );
  }
  if (config.initialConcurrency < config.minConcurrency || config.initialConcurrency > config.maxConcurrency) {
    throw new Error(
      `initialConcurrency=${config.initialConcurrency} is out of allowed range [${config.minConcurrency}..${config.maxConcurrency}]`
    );
  }
  if (config.cpuLowerThreshold >= config.cpuUpperThreshold) {
    throw new Error(
      `cpuLowerThreshold=${config.cpuLowerThreshold} must be below cpuUpperThreshold=${config.cpuUpperThreshold}`
    );
  }
  return config;
};

/**
 * Fills defaults; keys present but undefined count as unset. The upper bound
 * and pool size follow the initial concurrency unless set explicitly.
 */
export const resolveHarvestConfig = (input: HarvestConfigInput = {}): HarvestConfig => {
  const pick = <K extends keyof HarvestConfig>(key: K): HarvestConfig[K] => input[key] ?? defaultHarvestConfig[key];
  const initialConcurrency = pick("initialConcurrency");
  return validateHarvestConfig({
    initialConcurrency,
    minConcurrency: pick("minConcurrency"),
    maxConcurrency: input.maxConcurrency ?? initialConcurrency,
    workerPoolSize: input.workerPoolSize ?? initialConcurrency,
    autoConcurrencyEnabled: pick("autoConcurrencyEnabled"),
    cpuUpperThreshold: pick("cpuUpperThreshold"),
    cpuLowerThreshold: pick("cpuLowerThreshold"),
    memUpperThreshold: pick("memUpperThreshold"),
    checkIntervalSeconds: pick("checkIntervalSeconds"),
    cooldownSeconds: pick("cooldownSeconds"),
    workerRetryCount: pick("workerRetryCount"),
    retryBaseDelayMs: pick("retryBaseDelayMs"),
    numSubmissionWorkers: pick("numSubmissionWorkers"),
    failureRateThreshold: pick("failureRateThreshold"),
    opsPerWorkerPerMinute: pick("opsPerWorkerPerMinute"),
    failureWindowSeconds: pick("failureWindowSeconds"),
    prioritizeByPriorInf: pick("prioritizeByPriorInf")
  });
};
