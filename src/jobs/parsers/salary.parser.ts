const AMOUNT_PATTERN = /(\d[\d\s.,]*)(\s*[kK]\b)?/;
const THOUSANDS_THRESHOLD = 1000;

/**
 * Parses a salary floor such as "80000", "80K", "80.5k" or "€80,000" into
 * a whole amount. Bare figures under 1000 are read as thousands ("80" is
 * 80000). Returns null when no positive amount is present.
 */
export function parseSalaryAmount(input: string | number | null | undefined): number | null {
  if (typeof input === "number") {
    return Number.isFinite(input) && input > 0 ? scaleThousands(Math.round(input)) : null;
  }
  const raw = (input ?? "").trim();
  if (!raw) {
    return null;
  }

  const match = raw.match(AMOUNT_PATTERN);
  if (!match) {
    return null;
  }

  const digits = match[1].trim();
  if (match[2]) {
    const numeric = Number(digits.replace(/\s/g, "").replace(",", "."));
    return Number.isFinite(numeric) && numeric > 0 ? Math.round(numeric * 1000) : null;
  }

  const amount = Number(digits.replace(/\D/g, ""));
  if (!Number.isFinite(amount) || amount <= 0) {
    return null;
  }
  return scaleThousands(amount);
}

function scaleThousands(amount: number): number {
  return amount < THOUSANDS_THRESHOLD ? amount * 1000 : amount;
}
