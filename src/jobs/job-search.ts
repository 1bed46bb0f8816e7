import { JobRecord, JobSearchCriteria } from "../shared/types/job.types";

export const MAX_SEARCH_RESULTS = 20;

/**
 * Pre-filter applied before triage. Industry must match exactly (case
 * insensitive), salary must reach the floor, and the wanted location must be
 * part of the job location unless either side mentions remote work.
 * Input order is kept; at most 20 jobs are returned.
 */
export function searchJobs(
  jobs: ReadonlyArray<JobRecord>,
  criteria: JobSearchCriteria = {},
  limit = MAX_SEARCH_RESULTS,
): JobRecord[] {
  const industry = criteria.industry?.trim().toLowerCase() ?? "";
  const location = criteria.location?.trim().toLowerCase() ?? "";
  const minSalary = criteria.minSalary ?? 0;

  return jobs
    .filter((job) => {
      if (industry && job.industry.toLowerCase() !== industry) {
        return false;
      }
      if (minSalary > 0 && job.salary < minSalary) {
        return false;
      }
      if (location) {
        const jobLocation = job.location.toLowerCase();
        const remote = location.includes("remote") || jobLocation.includes("remote");
        if (!remote && !jobLocation.includes(location)) {
          return false;
        }
      }
      return true;
    })
    .slice(0, Math.max(0, limit));
}
