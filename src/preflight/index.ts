export {
  nodeSystemProbe,
  diskSpaceCheck,
  memoryCheck,
  cpuCheck,
  portsCheck,
  containerEngineCheck,
  createDefaultChecks,
  runPreflight,
} from './system-checks';
export type { SystemProbe, PortState, DefaultChecksOptions } from './system-checks';
