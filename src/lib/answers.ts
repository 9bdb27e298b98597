const YES = new Set(["tak", "t", "yes", "y"]);
const NO = new Set(["nie", "n", "no"]);

// "still" / "not working" style replies after a suggested fix, English and Polish
const STILL_BROKEN = [
  "still",
  "not working",
  "doesn't work",
  "does not work",
  "didn't help",
  "did not help",
  "nadal",
  "wciąż",
  "dalej",
  "nie pomogło",
  "nie działa",
];

function normalize(text: string): string {
  return (text || "").trim().toLowerCase();
}

export function isYes(text: string): boolean {
  return YES.has(normalize(text));
}

export function isNo(text: string): boolean {
  return NO.has(normalize(text));
}

/**
 * Reply says the suggested fix did not work, without being a bare "no".
 */
export function isStillBroken(text: string): boolean {
  const lower = normalize(text);
  return STILL_BROKEN.some((phrase) => lower.includes(phrase));
}
