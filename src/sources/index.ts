import type { JobSource } from './base';
import { JobSpySource } from './jobspy';
import { RemoteOKSource } from './remoteok';
import { WeWorkRemotelySource } from './weworkremotely';
import type { Config } from '../config';

/**
 * Factory function to create enabled job sources based on configuration.
 * Sources are always returned in the same declared order.
 */
export function createJobSources(config: Config): JobSource[] {
  const sources: JobSource[] = [];

  if (config.enableGoogle) {
    sources.push(new JobSpySource('google'));
  }

  if (config.enableLinkedIn) {
    sources.push(new JobSpySource('linkedin'));
  }

  if (config.enableIndeed) {
    sources.push(new JobSpySource('indeed'));
  }

  if (config.enableRemoteOK) {
    sources.push(new RemoteOKSource());
  }

  if (config.enableWWR) {
    sources.push(new WeWorkRemotelySource());
  }

  return sources;
}

export type { JobSource } from './base';
