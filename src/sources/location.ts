import type { JobLocation } from '../types/job';

const REMOTE_ONLY = /^(remote|anywhere|worldwide|anywhere in the world)$/i;

/**
 * Splits free-text locations such as "Brooklyn, NY, United States".
 * One part is read as a country, two as city and state.
 */
export function parseLocationText(text: string | undefined): JobLocation | undefined {
  if (!text) return undefined;

  const parts = text
    .split(',')
    .map(part => part.trim())
    .filter(part => part.length > 0 && !REMOTE_ONLY.test(part));

  switch (parts.length) {
    case 0:
      return undefined;
    case 1:
      return { country: parts[0] };
    case 2:
      return { city: parts[0], state: parts[1] };
    default:
      return { city: parts[0], state: parts[1], country: parts.slice(2).join(', ') };
  }
}
