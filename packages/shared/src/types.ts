/**
 * Wire types for the interview and portfolio-chat API.
 * Field names are snake_case on the wire; clients import these directly.
 */

export type Sector = "engineering" | "business" | "health";

export type ExperienceLevel = "entry" | "mid" | "senior";

export interface StartInterviewRequest {
  /** Unknown sectors fall back to the engineering context. */
  sector: string;
  position: string;
  /** Unknown levels fall back to the engineering/entry context. */
  experience_level: string;
  focus_area?: string | null;
}

export interface InterviewQuestionResponse {
  question: string;
  interview_id: string;
  question_number: number;
  total_questions: number;
}

export interface SubmitAnswerRequest {
  interview_id: string;
  question_number: number;
  answer: string;
}

export interface FeedbackResponse {
  feedback: string;
  strengths: string[];
  improvements: string[];
  /** 0-100 as requested of the model; passed through unvalidated. */
  score: number;
  next_question: InterviewQuestionResponse | null;
  interview_complete: boolean;
}

export interface InterviewSummaryResponse {
  summary: string;
  total_questions: number;
  sector: string;
  position: string;
}

export type ChatRole = "user" | "assistant" | "system";

export interface ChatTurn {
  role: ChatRole;
  content: string;
}

export interface PortfolioChatRequest {
  message: string;
  conversation_history?: ChatTurn[];
}

export interface PortfolioChatResponse {
  response: string;
}

export interface ErrorResponse {
  error: string;
}
