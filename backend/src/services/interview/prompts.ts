/**
 * Prompt builders for the interview flow. Pure string functions; no LLM calls here.
 * The feedback format block is parsed by feedbackParser.ts and must change with it.
 */

export const QUESTION_SYSTEM_PROMPT =
  "You are a professional interviewer conducting technical and behavioral interviews.";
export const FEEDBACK_SYSTEM_PROMPT =
  "You are a professional interviewer providing constructive feedback on interview answers.";
export const SUMMARY_SYSTEM_PROMPT =
  "You are a professional interviewer providing comprehensive interview summaries.";

export const QUESTION_MAX_TOKENS = 200;
export const FEEDBACK_MAX_TOKENS = 500;
export const SUMMARY_MAX_TOKENS = 800;
export const INTERVIEW_TEMPERATURE = 0.7;

/** Characters of each answer kept in the summary prompt. */
export const SUMMARY_ANSWER_PREVIEW_CHARS = 200;

export const FEEDBACK_FORMAT = `FEEDBACK: [your feedback]
STRENGTHS: [strength 1], [strength 2], [strength 3]
IMPROVEMENTS: [improvement 1], [improvement 2], [improvement 3]
SCORE: [0-100]`;

function header(context: string, position: string, focusArea: string | null | undefined): string {
  return `${context}
Position: ${position}
Focus Area: ${focusArea || "General"}`;
}

/**
 * Ask for exactly one question. With no prior questions this is the opening question;
 * otherwise the model is told which questions were already asked.
 */
export function buildQuestionPrompt(
  context: string,
  position: string,
  focusArea: string | null | undefined,
  priorQuestions: readonly string[]
): string {
  if (priorQuestions.length === 0) {
    return `${header(context, position, focusArea)}

Generate an appropriate interview question for this candidate. Make it relevant, challenging, and appropriate for the experience level.
Question should be clear and allow the candidate to demonstrate their knowledge and skills.
Return ONLY the question text, nothing else.`;
  }

  return `${header(context, position, focusArea)}

Previous questions asked: ${priorQuestions.join(", ")}

Generate the next interview question. Make it different from previous questions and relevant to the position.
Return ONLY the question text, nothing else.`;
}

export function buildFeedbackPrompt(
  context: string,
  position: string,
  question: string,
  answer: string
): string {
  return `${context}
Position: ${position}

Question asked: ${question}
Candidate's answer: ${answer}

Provide detailed feedback on this answer:
1. Overall assessment (1-2 sentences)
2. Strengths (2-3 bullet points)
3. Areas for improvement (2-3 bullet points)
4. A score from 0-100

Format your response as:
${FEEDBACK_FORMAT}`;
}

export type SummaryPromptInput = {
  sector: string;
  position: string;
  experienceLevel: string;
  questions: readonly string[];
  answers: readonly string[];
};

/** Answers are cut to their first 200 characters; "..." is always appended. */
export function buildSummaryPrompt(input: SummaryPromptInput): string {
  const questionLines = input.questions.map((q, i) => `${i + 1}. ${q}`).join("\n");
  const answerLines = input.answers
    .map((a, i) => `${i + 1}. ${a.slice(0, SUMMARY_ANSWER_PREVIEW_CHARS)}...`)
    .join("\n");

  return `Generate an overall interview summary for a ${input.experienceLevel} level ${input.position} position in the ${input.sector} sector.

Questions asked:
${questionLines}

Answers provided:
${answerLines}

Provide:
1. Overall performance assessment
2. Key strengths demonstrated
3. Areas needing improvement
4. Recommendations for further preparation`;
}
