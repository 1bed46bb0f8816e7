import assert from "node:assert/strict";
import { test } from "node:test";
import { silentLogger } from "../../config/logger";
import { ScoringEngine } from "../../matching/matching.engine";
import { toMatchPayload } from "../../matching/match.serializer";
import { truckDriverJob, truckDriverResume } from "../helpers/fixtures";
import { FIXED_NOW } from "../helpers/scripted-oracle";

test("scores a qualified driver without an oracle", async () => {
  const engine = new ScoringEngine({ oracle: null, logger: silentLogger, now: FIXED_NOW });
  const match = await engine.scoreCandidate(truckDriverResume, truckDriverJob, { location: "Lyon" });
  const { deterministic, semantic, bonus } = match.scoreBreakdown;

  assert.equal(deterministic.skillsMatching.score, 15);
  assert.equal(deterministic.experienceYears.score, 9);
  assert.equal(deterministic.experienceYears.metadata.resume_years, 12);
  assert.equal(deterministic.educationMatch.score, 1);
  assert.equal(deterministic.salaryFit.score, 5);
  assert.equal(deterministic.locationMatch.score, 5);
  assert.equal(deterministic.total, 35);

  assert.equal(semantic.total, 0);
  assert.equal(
    semantic.softSkillsMatch.explanation,
    "error: soft_skills_v1 failed (oracle_unavailable): no oracle configured",
  );
  assert.equal(bonus.total, 0);
  assert.equal(match.matchScore, 35);

  assert.equal(
    match.overallExplanation,
    "Weak candidate with 35/100. Strong skills and salary fit. Could improve rare skills and career trajectory.",
  );
  assert.deepEqual(match.strengths, [
    "Strong technical skills with 6+ matched competencies",
    "Excellent experience level (12+ years)",
    "Salary expectations well-aligned",
    "Excellent location fit",
  ]);
  assert.deepEqual(match.weaknesses, [
    "Education level could be higher",
    "Soft skills need development",
    "Cultural fit uncertain",
    "Growth potential unclear",
  ]);
  assert.equal(match.recommendation, "Not recommended - Significant gaps in requirements");

  const payload = toMatchPayload(match);
  assert.deepEqual(payload.score_breakdown.deterministic.details.skills_matching.matched_skills, [
    "Permis C",
    "FIMO",
    "Carte conducteur",
    "Expérience route",
    "Ponctualité",
    "Autonomie",
  ]);
  assert.equal(payload.score_breakdown.deterministic.details.skills_matching.soft_skills_matched, 2);
});
