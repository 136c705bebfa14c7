export { PlatformCollector } from './platform-collector';
export { NetworkCollector, formatMacAddress } from './network-collector';
export { HardwareCollector, DEFAULT_CPU_SAMPLE_MS, cpuUsageBetween, toDiskInfo, toMemoryInfo } from './hardware-collector';
export type { HardwareCollectorOptions } from './hardware-collector';
export { ProcessCollector } from './process-collector';
export { attempt, classifyOmission, OmissionTally } from './omission';
export type { ItemResult, OmissionReason } from './omission';
