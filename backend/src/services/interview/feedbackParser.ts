/**
 * Line-oriented scanner for the feedback reply requested by buildFeedbackPrompt:
 *
 *   FEEDBACK: <text>
 *   STRENGTHS: <s1>, <s2>
 *   IMPROVEMENTS: <i1>, <i2>
 *   SCORE: <0-100>
 *
 * Total function: malformed replies degrade to defaults instead of failing.
 * Tags are case-sensitive and must start the line. The score is not range-checked.
 */

export type ParsedFeedback = {
  feedback: string;
  strengths: string[];
  improvements: string[];
  score: number;
};

export const DEFAULT_SCORE = 70.0;

type Section = "none" | "feedback" | "strengths" | "improvements";

const FEEDBACK_TAG = "FEEDBACK:";
const STRENGTHS_TAG = "STRENGTHS:";
const IMPROVEMENTS_TAG = "IMPROVEMENTS:";
const SCORE_TAG = "SCORE:";

// Decimal literal, optional sign and exponent. Hex, "inf", "85/100" and "" do not match.
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

function splitList(rest: string): string[] {
  return rest
    .trim()
    .split(",")
    .map((item) => item.trim());
}

export function parseScore(raw: string): number {
  const trimmed = raw.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return DEFAULT_SCORE;
  const value = Number(trimmed);
  // "1e400" matches the pattern but overflows to Infinity.
  return Number.isFinite(value) ? value : DEFAULT_SCORE;
}

export function parseFeedback(reply: string): ParsedFeedback {
  let feedback = "";
  let strengths: string[] = [];
  let improvements: string[] = [];
  let score = DEFAULT_SCORE;
  let active: Section = "none";

  for (const line of reply.split("\n")) {
    if (line.startsWith(FEEDBACK_TAG)) {
      feedback = line.slice(FEEDBACK_TAG.length).trim();
      active = "feedback";
    } else if (line.startsWith(STRENGTHS_TAG)) {
      strengths = splitList(line.slice(STRENGTHS_TAG.length));
      active = "strengths";
    } else if (line.startsWith(IMPROVEMENTS_TAG)) {
      improvements = splitList(line.slice(IMPROVEMENTS_TAG.length));
      active = "improvements";
    } else if (line.startsWith(SCORE_TAG)) {
      // SCORE leaves the active section as it was.
      score = parseScore(line.slice(SCORE_TAG.length));
    } else if (line.trim() && active === "feedback") {
      feedback += " " + line.trim();
    }
  }

  return { feedback, strengths, improvements, score };
}
