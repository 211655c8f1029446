export { formatAvailability, probeAvailability } from './prober';
export type { AvailabilityEntry } from './prober';
