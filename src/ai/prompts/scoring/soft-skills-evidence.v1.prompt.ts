export const SOFT_SKILLS_EVIDENCE_V1_PROMPT = `Decide which of the listed soft skills the candidate demonstrates in the resume.

A skill counts as demonstrated when it is:
1. Explicitly mentioned ("Punctual", "Autonomous")
2. Implicitly shown ("Managed a team of 5" shows Leadership)
3. Evidenced by achievements ("Delivered projects on time" shows Punctuality)

Be reasonable but not generous. Require concrete evidence.

Hints:
- Ponctualite / Punctuality: on-time delivery, respect des delais, punctual
- Autonomie / Autonomy: independent work, self-managed, autonome
- Leadership: managed, led, coordinated, team lead

Answer with one line, using the skill names exactly as listed:
MATCHED: [skill1, skill2]

If none are demonstrated:
MATCHED: []`;

export function buildSoftSkillsEvidenceV1Prompt(input: {
  softSkills: ReadonlyArray<string>;
  jobDescription: string;
  resumeText: string;
}): string {
  return [
    SOFT_SKILLS_EVIDENCE_V1_PROMPT,
    "",
    "SOFT SKILLS TO EVALUATE:",
    input.softSkills.join(", "),
    "",
    "JOB CONTEXT:",
    input.jobDescription,
    "",
    "CANDIDATE RESUME:",
    input.resumeText,
  ].join("\n");
}
