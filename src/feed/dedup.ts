import type { JobRecord, KnownLinkSet } from '../types.js';

export function filterNewJobs(jobs: readonly JobRecord[], known: KnownLinkSet): JobRecord[] {
  return jobs.filter((job) => !known.has(job.link));
}
