export interface JobRecord {
  id?: string;
  title: string;
  company: string;
  location: string;
  salary: number;
  industry: string;
  description: string;
  requirements: string[];
  culture?: string;
}

/**
 * Per-request candidate data. Passed explicitly into every scoring call;
 * nothing about the candidate is held between requests.
 */
export interface CandidateContext {
  location?: string;
  salaryExpectation?: number;
}

export interface JobSearchCriteria {
  industry?: string;
  location?: string;
  minSalary?: number;
}
