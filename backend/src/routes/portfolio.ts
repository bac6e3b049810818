import { Router } from "express";
import { z } from "zod";
import { validateBody } from "../middlewares/validate";
import type { PortfolioChatRequest } from "../../../packages/shared/src/types";
import type { PortfolioChatHandler } from "../services/portfolio/chat";

const chatSchema = z.object({
  message: z.string().min(1, "message is required"),
  conversation_history: z
    .array(
      z.object({
        role: z.enum(["user", "assistant", "system"]),
        content: z.string()
      })
    )
    .default([])
});

export function createPortfolioRouter(handler: PortfolioChatHandler): Router {
  const router = Router();

  router.post("/chat", validateBody(chatSchema), async (req, res, next) => {
    try {
      const { message, conversation_history = [] }: PortfolioChatRequest = req.body;
      res.json(await handler.chat(message, conversation_history));
    } catch (e) {
      next(e);
    }
  });

  return router;
}
