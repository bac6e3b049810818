import express from "express";
import { env } from "./config/env";
import { errorHandler, notFoundHandler } from "./middlewares/errorHandler";
import { createInterviewRouter } from "./routes/interview";
import { createPortfolioRouter } from "./routes/portfolio";
import { InterviewOrchestrator } from "./services/interview/orchestrator";
import { InMemorySessionStore, type SessionStore } from "./services/interview/sessionStore";
import { createOpenAILlmClient, type LlmClient } from "./services/llm/client";
import { PortfolioChatHandler } from "./services/portfolio/chat";
import { loadPortfolioProfile } from "./services/portfolio/profile";

const ALLOWED_ORIGINS = env.FRONTEND_ORIGIN.split(",")
  .map((o) => o.trim())
  .filter(Boolean);

export type AppDependencies = {
  /** Generates interview questions, feedback and summaries. */
  interviewLlm: LlmClient;
  /** Generates portfolio assistant replies. */
  chatLlm: LlmClient;
  store: SessionStore;
  totalQuestions: number;
  portfolioProfile: string;
};

export type DefaultDependencies = AppDependencies & { store: InMemorySessionStore };

export function createDefaultDependencies(): DefaultDependencies {
  return {
    interviewLlm: createOpenAILlmClient({
      apiKey: env.OPENAI_API_KEY,
      model: env.OPENAI_MODEL,
      timeoutMs: env.LLM_TIMEOUT_MS
    }),
    chatLlm: createOpenAILlmClient({
      apiKey: env.OPENAI_API_KEY,
      model: env.OPENAI_CHAT_MODEL,
      timeoutMs: env.LLM_TIMEOUT_MS
    }),
    store: new InMemorySessionStore({ ttlMs: env.SESSION_TTL_MINUTES * 60 * 1000 }),
    totalQuestions: env.TOTAL_QUESTIONS,
    portfolioProfile: loadPortfolioProfile(env.PORTFOLIO_PROFILE_PATH)
  };
}

export function createApp(deps: AppDependencies = createDefaultDependencies()) {
  const orchestrator = new InterviewOrchestrator({
    llm: deps.interviewLlm,
    store: deps.store,
    totalQuestions: deps.totalQuestions
  });
  const portfolioChat = new PortfolioChatHandler({ llm: deps.chatLlm, profile: deps.portfolioProfile });

  const app = express();
  app.use(express.json());

  app.use((req, res, next) => {
    const origin = req.headers.origin;
    if (origin && ALLOWED_ORIGINS.includes(origin)) {
      res.setHeader("Access-Control-Allow-Origin", origin);
      res.setHeader("Access-Control-Allow-Credentials", "true");
      res.setHeader("Vary", "Origin");
    }
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type, Authorization");
    if (req.method === "OPTIONS") {
      return res.sendStatus(204);
    }
    next();
  });

  app.get("/", (_req, res) => {
    res.json({ message: "AI Interview Prep Tool API", portfolio_chat: "/api/portfolio/chat" });
  });

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.use("/api/interview", createInterviewRouter(orchestrator));
  app.use("/api/portfolio", createPortfolioRouter(portfolioChat));
  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
