export type ResourceSample = {
  cpuPercent: number;
  memoryPercent: number;
};

export interface ResourceMonitor {
  sample(): ResourceSample;
}
