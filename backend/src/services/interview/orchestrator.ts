/**
 * Interview state machine: start -> N x (answer, feedback, next question) -> complete -> summary.
 *
 * Answers for one session are serialized through a keyed lock. A round is committed to the
 * store only after every generation call for it has succeeded, so a failed call leaves the
 * session unchanged and the same round can be resubmitted.
 */

import type {
  FeedbackResponse,
  InterviewQuestionResponse,
  InterviewSummaryResponse,
  StartInterviewRequest,
  SubmitAnswerRequest
} from "../../../../packages/shared/src/types";
import { GenerationError, InvalidSessionStateError, SessionNotFoundError, errorMessage } from "../errors";
import type { GenerateTextArgs, LlmClient } from "../llm/client";
import { KeyedLock } from "../../utils/keyedLock";
import { resolveContext } from "./contexts";
import { parseFeedback } from "./feedbackParser";
import {
  FEEDBACK_MAX_TOKENS,
  FEEDBACK_SYSTEM_PROMPT,
  INTERVIEW_TEMPERATURE,
  QUESTION_MAX_TOKENS,
  QUESTION_SYSTEM_PROMPT,
  SUMMARY_MAX_TOKENS,
  SUMMARY_SYSTEM_PROMPT,
  buildFeedbackPrompt,
  buildQuestionPrompt,
  buildSummaryPrompt
} from "./prompts";
import type { InterviewSession, SessionStore } from "./sessionStore";

export const DEFAULT_TOTAL_QUESTIONS = 5;

type GenerationKind = "question" | "feedback" | "summary";

export type InterviewOrchestratorOptions = {
  llm: LlmClient;
  store: SessionStore;
  totalQuestions?: number;
};

export class InterviewOrchestrator {
  private readonly llm: LlmClient;
  private readonly store: SessionStore;
  private readonly totalQuestions: number;
  private readonly lock = new KeyedLock();

  constructor(options: InterviewOrchestratorOptions) {
    this.llm = options.llm;
    this.store = options.store;
    this.totalQuestions = options.totalQuestions ?? DEFAULT_TOTAL_QUESTIONS;
  }

  async start(request: StartInterviewRequest): Promise<InterviewQuestionResponse> {
    const context = resolveContext(request.sector, request.experience_level);
    const question = await this.generateQuestion(null, context, request.position, request.focus_area, []);

    const session = this.store.create({
      sector: request.sector,
      position: request.position,
      experienceLevel: request.experience_level,
      focusArea: request.focus_area ?? null,
      questions: [question],
      answers: [],
      currentQuestion: 0,
      totalQuestions: this.totalQuestions
    });

    return {
      question,
      interview_id: session.id,
      question_number: 1,
      total_questions: session.totalQuestions
    };
  }

  submitAnswer(submission: SubmitAnswerRequest): Promise<FeedbackResponse> {
    return this.lock.run(submission.interview_id, () => this.answerRound(submission));
  }

  async summary(id: string): Promise<InterviewSummaryResponse> {
    const session = this.requireSession(id);
    if (session.currentQuestion < session.totalQuestions) {
      throw new InvalidSessionStateError("Interview not yet complete");
    }

    const summary = await this.generate("summary", id, {
      prompt: buildSummaryPrompt({
        sector: session.sector,
        position: session.position,
        experienceLevel: session.experienceLevel,
        questions: session.questions,
        answers: session.answers
      }),
      systemPrompt: SUMMARY_SYSTEM_PROMPT,
      maxTokens: SUMMARY_MAX_TOKENS,
      temperature: INTERVIEW_TEMPERATURE
    });

    return {
      summary,
      total_questions: session.questions.length,
      sector: session.sector,
      position: session.position
    };
  }

  /** Discards a session. Waits for any in-flight answer on the same id. */
  close(id: string): Promise<void> {
    return this.lock.run(id, async () => {
      if (!this.store.delete(id)) throw new SessionNotFoundError();
    });
  }

  private async answerRound(submission: SubmitAnswerRequest): Promise<FeedbackResponse> {
    const id = submission.interview_id;
    const session = this.requireSession(id);

    if (submission.question_number - 1 !== session.currentQuestion) {
      throw new InvalidSessionStateError("Invalid question number");
    }
    if (session.currentQuestion >= session.totalQuestions) {
      throw new InvalidSessionStateError("Interview already complete");
    }

    const context = resolveContext(session.sector, session.experienceLevel);
    const question = session.questions[submission.question_number - 1];
    const reply = await this.generate("feedback", id, {
      prompt: buildFeedbackPrompt(context, session.position, question, submission.answer),
      systemPrompt: FEEDBACK_SYSTEM_PROMPT,
      maxTokens: FEEDBACK_MAX_TOKENS,
      temperature: INTERVIEW_TEMPERATURE
    });
    const parsed = parseFeedback(reply);

    const answered = session.currentQuestion + 1;
    const interviewComplete = answered >= session.totalQuestions;
    const nextQuestion = interviewComplete
      ? null
      : await this.generateQuestion(id, context, session.position, session.focusArea, session.questions);

    this.store.mutate(id, (stored) => {
      stored.answers.push(submission.answer);
      stored.currentQuestion = answered;
      if (nextQuestion !== null) stored.questions.push(nextQuestion);
    });

    return {
      ...parsed,
      next_question:
        nextQuestion === null
          ? null
          : {
              question: nextQuestion,
              interview_id: id,
              question_number: submission.question_number + 1,
              total_questions: session.totalQuestions
            },
      interview_complete: interviewComplete
    };
  }

  private requireSession(id: string): InterviewSession {
    const session = this.store.get(id);
    if (!session) throw new SessionNotFoundError();
    return session;
  }

  private generateQuestion(
    sessionId: string | null,
    context: string,
    position: string,
    focusArea: string | null | undefined,
    priorQuestions: readonly string[]
  ): Promise<string> {
    return this.generate("question", sessionId, {
      prompt: buildQuestionPrompt(context, position, focusArea, priorQuestions),
      systemPrompt: QUESTION_SYSTEM_PROMPT,
      maxTokens: QUESTION_MAX_TOKENS,
      temperature: INTERVIEW_TEMPERATURE
    });
  }

  private async generate(
    kind: GenerationKind,
    sessionId: string | null,
    args: GenerateTextArgs
  ): Promise<string> {
    try {
      return await this.llm.generateText(args);
    } catch (err) {
      console.error(`Interview ${kind} generation failed:`, { interview_id: sessionId, error: errorMessage(err) });
      throw new GenerationError(`Error generating ${kind}: ${errorMessage(err)}`, { cause: err });
    }
  }
}
