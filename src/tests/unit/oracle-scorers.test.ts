import assert from "node:assert/strict";
import { test } from "node:test";
import { silentLogger } from "../../config/logger";
import { BonusScorer } from "../../matching/scoring/bonus.scorer";
import { SemanticScorer } from "../../matching/scoring/semantic.scorer";
import { ScriptedOracle } from "../helpers/scripted-oracle";

const input = {
  resumeText: "Chauffeur PL depuis 2016, livraisons régionales.",
  jobDescription: "Transport régional de marchandises.",
  jobTitle: "Chauffeur PL",
};

test("scores the semantic dimensions independently", async () => {
  const oracle = new ScriptedOracle({
    soft_skills_v1: "SCORE: 12/15\nEXPLANATION: Led crews.",
    culture_fit_v1: new Error("HTTP 500"),
    growth_potential_v1: "I would say 8",
    project_relevance_v1: "SCORE: 9\nEXPLANATION: Regional routes.",
  });
  const score = await new SemanticScorer(oracle, silentLogger).score({ ...input, companyCulture: "Flat hierarchy" });

  assert.equal(score.softSkillsMatch.score, 12);
  assert.equal(score.softSkillsMatch.explanation, "Led crews.");
  assert.equal(score.cultureFit.score, 0);
  assert.equal(score.cultureFit.explanation, "error: HTTP 500");
  assert.equal(score.growthPotential.score, 8);
  assert.equal(score.growthPotential.explanation, "I would say 8");
  assert.equal(score.projectRelevance.score, 5);
  assert.equal(score.total, 25);
  assert.equal(score.maxTotal, 40);
  assert.match(oracle.promptFor("culture_fit_v1"), /COMPANY CULTURE:\nFlat hierarchy/);
});

test("omits the culture section when none is given", async () => {
  const oracle = new ScriptedOracle({});
  await new SemanticScorer(oracle, silentLogger).score(input);
  assert.doesNotMatch(oracle.promptFor("culture_fit_v1"), /COMPANY CULTURE/);
});

test("scores the bonus dimensions and isolates failures", async () => {
  const oracle = new ScriptedOracle({
    industry_experience_v1: "SCORE: 7.5\nEXPLANATION: Some logistics.",
    rare_skills_v1: "SCORE: 0\nEXPLANATION: No rare skills relevant here.",
  });
  const score = await new BonusScorer(oracle, silentLogger).score({ ...input, industry: "Transport" });

  assert.equal(score.industryExperience.score, 7.5);
  assert.equal(score.rareSkillsPremium.score, 0);
  assert.equal(score.rareSkillsPremium.explanation, "No rare skills relevant here.");
  assert.equal(score.careerTrajectory.score, 0);
  assert.equal(score.careerTrajectory.explanation, "error: no scripted reply for career_trajectory_v1");
  assert.equal(score.total, 7.5);
  assert.match(oracle.promptFor("rare_skills_v1"), /irrelevant to the job score 0/);
});
