import { readFile } from "node:fs/promises";
import { createApp } from "../src/app";
import { loadEnv } from "../src/config/env";
import { normalizeJobRecords } from "../src/jobs/job-record.normalizer";
import { parseSalaryAmount } from "../src/jobs/parsers/salary.parser";
import { toMatchPayload } from "../src/matching/match.serializer";
import { CandidateContext, JobSearchCriteria } from "../src/shared/types/job.types";

interface CliArgs {
  resumePath: string;
  jobsPath: string;
  location?: string;
  salary?: number;
  industry?: string;
}

const USAGE = "Usage: tsx scripts/score-match.ts <resume.txt> <jobs.json> [--location X] [--salary N] [--industry X]";

function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  const flags = new Map<string, string>();
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg.startsWith("--")) {
      const value = argv[index + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new Error(`Missing value for ${arg}. ${USAGE}`);
      }
      flags.set(arg.slice(2), value);
      index += 1;
    } else {
      positional.push(arg);
    }
  }

  const [resumePath, jobsPath] = positional;
  if (!resumePath || !jobsPath) {
    throw new Error(USAGE);
  }
  const salaryRaw = flags.get("salary");
  const salary = salaryRaw === undefined ? undefined : parseSalaryAmount(salaryRaw);
  if (salary === null) {
    throw new Error(`Invalid --salary value: ${salaryRaw}`);
  }
  return {
    resumePath,
    jobsPath,
    location: flags.get("location"),
    salary,
    industry: flags.get("industry"),
  };
}

async function run(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const { engine, logger } = createApp(loadEnv());

  const resumeText = await readFile(args.resumePath, "utf8");
  const parsedJobs: unknown = JSON.parse(await readFile(args.jobsPath, "utf8"));
  const jobs = normalizeJobRecords(parsedJobs);

  const context: CandidateContext = { location: args.location, salaryExpectation: args.salary };
  const criteria: JobSearchCriteria = { location: args.location, minSalary: args.salary, industry: args.industry };
  const result = await engine.rankJobs(resumeText, jobs, context, criteria);

  if (result.mode === "listed") {
    process.stdout.write(`${JSON.stringify({ count: result.jobs.length, jobs: result.jobs }, null, 2)}\n`);
    return;
  }

  const output = {
    count: result.matches.length,
    quick_filter_fallback: result.usedQuickFilterFallback,
    matches: result.matches.map((entry) => ({
      quick_score: entry.quickScore,
      ...toMatchPayload(entry.match),
    })),
    usage: engine.getUsage(),
  };
  process.stdout.write(`${JSON.stringify(output, null, 2)}\n`);
  logger.info("score-match finished", { jobs: jobs.length, scored: result.matches.length });
}

run().catch((error: unknown) => {
  console.error("score-match failed:", error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
