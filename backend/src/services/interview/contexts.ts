import type { ExperienceLevel, Sector } from "../../../../packages/shared/src/types";

/** Interviewer narrative per sector and experience level; injected at the top of every prompt. */
export const SECTOR_CONTEXTS: Record<Sector, Record<ExperienceLevel, string>> = {
  engineering: {
    entry:
      "You are interviewing a fresh computer engineering graduate for an entry-level software engineering position.",
    mid: "You are interviewing a mid-level computer engineer with 3-5 years of experience.",
    senior: "You are interviewing a senior computer engineer with 5+ years of experience."
  },
  business: {
    entry:
      "You are interviewing a recent graduate for an entry-level business analyst or consultant position.",
    mid: "You are interviewing a mid-level business professional with 3-5 years of experience.",
    senior: "You are interviewing a senior business professional with 5+ years of experience."
  },
  health: {
    entry: "You are interviewing a recent graduate for an entry-level healthcare position.",
    mid: "You are interviewing a mid-level healthcare professional with 3-5 years of experience.",
    senior: "You are interviewing a senior healthcare professional with 5+ years of experience."
  }
};

export const DEFAULT_CONTEXT = SECTOR_CONTEXTS.engineering.entry;

function isSector(value: string): value is Sector {
  return Object.prototype.hasOwnProperty.call(SECTOR_CONTEXTS, value);
}

function isExperienceLevel(value: string): value is ExperienceLevel {
  return value === "entry" || value === "mid" || value === "senior";
}

/**
 * Resolve the interviewer context. A miss on either axis (unknown sector or
 * unknown level) yields the engineering/entry context instead of an error.
 */
export function resolveContext(sector: string, experienceLevel: string): string {
  if (!isSector(sector) || !isExperienceLevel(experienceLevel)) return DEFAULT_CONTEXT;
  return SECTOR_CONTEXTS[sector][experienceLevel];
}
