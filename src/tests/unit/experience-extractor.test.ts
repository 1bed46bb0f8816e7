import assert from "node:assert/strict";
import { test } from "node:test";
import { silentLogger } from "../../config/logger";
import {
  ExperienceExtractor,
  extractRequiredYears,
  extractYearsFromDates,
  extractYearsFromKeywords,
} from "../../matching/experience/experience-extractor";
import { FIXED_NOW, ScriptedOracle } from "../helpers/scripted-oracle";

test("counts a closed date range", () => {
  assert.equal(extractYearsFromDates("Chauffeur 2015-2024", 2024), 9);
  assert.equal(extractYearsFromDates("Chauffeur de 2015 à 2024", 2024), 9);
});

test("counts an open range up to the reference year", () => {
  assert.equal(extractYearsFromDates("Depuis 2015 chez Transports Alpins", 2024), 9);
  assert.equal(extractYearsFromDates("2018 to present", 2024), 6);
});

test("counts an identical range once", () => {
  assert.equal(extractYearsFromDates("2015-2024 Chauffeur\nRappel: 2015 - 2024", 2024), 9);
});

test("sums distinct overlapping ranges", () => {
  assert.equal(extractYearsFromDates("2015-2024 Chauffeur\n2014-2023 Livreur", 2024), 18);
});

test("skips an open range whose start year is already counted", () => {
  assert.equal(extractYearsFromDates("Since 2020\n2020 - 2022 Driver", 2024), 2);
});

test("ignores implausible years", () => {
  assert.equal(extractYearsFromDates("1900-1910", 2024), 0);
  assert.equal(extractYearsFromDates("2030-2031", 2024), 0);
});

test("reads experience figures from keywords", () => {
  assert.equal(extractYearsFromKeywords("Over 7 years of experience in logistics"), 7);
  assert.equal(extractYearsFromKeywords("Expérience : 12 ans"), 12);
  assert.equal(extractYearsFromKeywords("Motivated driver"), 0);
});

test("reads required years from the posting", () => {
  assert.equal(extractRequiredYears("Minimum 5 years of experience required"), 5);
  assert.equal(extractRequiredYears("Senior role"), 5);
  assert.equal(extractRequiredYears("Junior position"), 1);
  assert.equal(extractRequiredYears("We hire drivers"), 3);
});

test("uses total years when no oracle is configured", async () => {
  const extractor = new ExperienceExtractor(null, silentLogger, FIXED_NOW);
  const result = await extractor.extractRelevantYears("2015-2024 Data analyst", "Chauffeur PL", "Transport");
  assert.deepEqual(result, {
    years: 9,
    explanation: "Total experience (relevance evaluation unavailable)",
    usedOracle: false,
  });
});

test("returns the oracle's relevant years", async () => {
  const oracle = new ScriptedOracle({
    relevant_experience_v1: "RELEVANT_YEARS: 0\nEXPLANATION: Unrelated field.",
  });
  const extractor = new ExperienceExtractor(oracle, silentLogger, FIXED_NOW);
  const result = await extractor.extractRelevantYears("2015-2024 Data analyst", "Chauffeur PL", "Transport");
  assert.deepEqual(result, { years: 0, explanation: "Unrelated field.", usedOracle: true });
  assert.match(oracle.promptFor("relevant_experience_v1"), /Chauffeur PL/);
});

test("truncates and clamps oracle years", async () => {
  const decimal = new ExperienceExtractor(
    new ScriptedOracle({ relevant_experience_v1: "RELEVANT_YEARS: 7.8\nEXPLANATION: Mostly relevant." }),
    silentLogger,
    FIXED_NOW,
  );
  assert.equal((await decimal.extractRelevantYears("", "Driver", "")).years, 7);

  const excessive = new ExperienceExtractor(
    new ScriptedOracle({ relevant_experience_v1: "RELEVANT_YEARS: 60" }),
    silentLogger,
    FIXED_NOW,
  );
  assert.deepEqual(await excessive.extractRelevantYears("", "Driver", ""), {
    years: 50,
    explanation: "50 relevant years",
    usedOracle: true,
  });
});

test("falls back to total years on an unusable reply", async () => {
  const extractor = new ExperienceExtractor(
    new ScriptedOracle({ relevant_experience_v1: "I cannot tell." }),
    silentLogger,
    FIXED_NOW,
  );
  const result = await extractor.extractRelevantYears("2015-2024 Driver", "Driver", "");
  assert.deepEqual(result, { years: 9, explanation: "Fallback: 9 years total experience", usedOracle: false });
});

test("falls back to total years when the oracle fails", async () => {
  const extractor = new ExperienceExtractor(
    new ScriptedOracle({ relevant_experience_v1: new Error("HTTP 500") }),
    silentLogger,
    FIXED_NOW,
  );
  const result = await extractor.extractRelevantYears("2015-2024 Driver", "Driver", "");
  assert.deepEqual(result, {
    years: 9,
    explanation: "Fallback due to error: 9 years total experience",
    usedOracle: false,
    oracleFailed: true,
  });
});
