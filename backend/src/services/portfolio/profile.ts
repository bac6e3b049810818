import fs from "node:fs";
import path from "node:path";

const profileCache = new Map<string, string>();

export function defaultProfilePath(): string {
  return path.resolve(process.cwd(), "backend", "data", "portfolio-profile.md");
}

/**
 * Load the portfolio system preamble (biography, skills, projects).
 * Caches after first load.
 */
export function loadPortfolioProfile(filePath: string = defaultProfilePath()): string {
  const cached = profileCache.get(filePath);
  if (cached !== undefined) return cached;

  if (!fs.existsSync(filePath)) {
    throw new Error(`Portfolio profile not found at ${filePath}`);
  }
  const text = fs.readFileSync(filePath, "utf8").trim();
  if (!text) {
    throw new Error(`Portfolio profile at ${filePath} is empty`);
  }
  profileCache.set(filePath, text);
  return text;
}
