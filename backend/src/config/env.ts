import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";

dotenv.config({
  path: path.resolve(process.cwd(), ".env")
});

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().default(8000),
  OPENAI_API_KEY: z.string().optional(),
  /** Model for interview questions, feedback and summaries. */
  OPENAI_MODEL: z.string().min(1).default("gpt-4"),
  /** Model for the portfolio assistant. */
  OPENAI_CHAT_MODEL: z.string().min(1).default("gpt-3.5-turbo"),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  /** Comma-separated origins for CORS. */
  FRONTEND_ORIGIN: z.string().default("http://localhost:3000,http://localhost:5173"),
  SESSION_TTL_MINUTES: z.coerce.number().int().positive().default(120),
  TOTAL_QUESTIONS: z.coerce.number().int().positive().default(5),
  PORTFOLIO_PROFILE_PATH: z.string().optional()
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const issueText = parsed.error.issues
    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    .join("; ");
  throw new Error(`Invalid environment variables: ${issueText}`);
}

export const env = parsed.data;
