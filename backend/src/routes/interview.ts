/**
 * Mock interview API: start, answer (feedback + next question), summary, close.
 */
import { Router } from "express";
import { z } from "zod";
import { validateBody } from "../middlewares/validate";
import type { InterviewOrchestrator } from "../services/interview/orchestrator";

const startSchema = z.object({
  sector: z.string().min(1, "sector is required"),
  position: z.string().min(1, "position is required"),
  experience_level: z.string().min(1, "experience_level is required"),
  focus_area: z.string().nullish()
});

const answerSchema = z.object({
  interview_id: z.string().min(1, "interview_id is required"),
  question_number: z.number().int(),
  answer: z.string()
});

export function createInterviewRouter(orchestrator: InterviewOrchestrator): Router {
  const router = Router();

  router.post("/start", validateBody(startSchema), async (req, res, next) => {
    try {
      const body: z.infer<typeof startSchema> = req.body;
      res.json(await orchestrator.start(body));
    } catch (e) {
      next(e);
    }
  });

  router.post("/answer", validateBody(answerSchema), async (req, res, next) => {
    try {
      const body: z.infer<typeof answerSchema> = req.body;
      res.json(await orchestrator.submitAnswer(body));
    } catch (e) {
      next(e);
    }
  });

  router.get("/:interview_id/summary", async (req, res, next) => {
    try {
      res.json(await orchestrator.summary(req.params.interview_id));
    } catch (e) {
      next(e);
    }
  });

  router.delete("/:interview_id", async (req, res, next) => {
    try {
      await orchestrator.close(req.params.interview_id);
      res.sendStatus(204);
    } catch (e) {
      next(e);
    }
  });

  return router;
}
