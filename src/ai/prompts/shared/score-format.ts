export function buildScoreFormatBlock(maxScore: number, explanationLength: string): string {
  return [
    "Provide:",
    `1. A score from 0 to ${maxScore}`,
    `2. A concise explanation (${explanationLength}) justifying the score`,
    "",
    "Format your response EXACTLY as:",
    "SCORE: [number]",
    "EXPLANATION: [your explanation]",
  ].join("\n");
}

export function optionalSection(label: string, value: string | undefined): string[] {
  const trimmed = value?.trim();
  return trimmed ? [`${label}:`, trimmed, ""] : [];
}
