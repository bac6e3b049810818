import request from "supertest";
import { afterEach, describe, expect, test, vi } from "vitest";
import { InMemorySessionStore } from "../src/services/interview/sessionStore";
import { SUMMARY_REPLY, createFakeLlm, createTestApp, muteConsoleError } from "./helpers";

type TestApp = ReturnType<typeof createTestApp>["app"];

const START_BODY = {
  sector: "business",
  position: "Product Analyst",
  experience_level: "entry",
  focus_area: "Metrics"
};

async function startInterview(app: TestApp): Promise<string> {
  const res = await request(app).post("/api/interview/start").send(START_BODY);
  expect(res.status).toBe(200);
  return res.body.interview_id;
}

async function answerAll(app: TestApp, interviewId: string, total: number) {
  let last: request.Response | null = null;
  for (let round = 1; round <= total; round++) {
    last = await request(app)
      .post("/api/interview/answer")
      .send({ interview_id: interviewId, question_number: round, answer: `Answer ${round}` });
    expect(last.status).toBe(200);
  }
  return last;
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("service routes", () => {
  test("GET / returns the banner", async () => {
    const { app } = createTestApp();
    const res = await request(app).get("/");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ message: "AI Interview Prep Tool API", portfolio_chat: "/api/portfolio/chat" });
  });

  test("GET /health", async () => {
    const { app } = createTestApp();
    const res = await request(app).get("/health");
    expect(res.body).toEqual({ ok: true });
  });

  test("unknown route is 404", async () => {
    const { app } = createTestApp();
    const res = await request(app).get("/api/nope");
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "Route not found" });
  });

  test("unexpected errors are 500 with a generic message", async () => {
    muteConsoleError();
    class BrokenStore extends InMemorySessionStore {
      get(): never {
        throw new Error("store offline");
      }
    }
    const { app } = createTestApp(createFakeLlm(), new BrokenStore({ ttlMs: 1000 }));
    const res = await request(app).get("/api/interview/any-id/summary");
    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: "Internal server error" });
  });

  test("allowed origins are echoed for CORS and pre-flight answers 204", async () => {
    const { app } = createTestApp();
    const res = await request(app).get("/health").set("Origin", "http://localhost:5173");
    expect(res.headers["access-control-allow-origin"]).toBe("http://localhost:5173");

    const other = await request(app).get("/health").set("Origin", "http://evil.example");
    expect(other.headers["access-control-allow-origin"]).toBeUndefined();

    const preflight = await request(app).options("/api/interview/start").set("Origin", "http://localhost:3000");
    expect(preflight.status).toBe(204);
  });
});

describe("POST /api/interview/start", () => {
  test("returns the first question", async () => {
    const { app, store } = createTestApp();
    const res = await request(app).post("/api/interview/start").send(START_BODY);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      question: "Question 1?",
      interview_id: res.body.interview_id,
      question_number: 1,
      total_questions: 5
    });
    expect(store.get(res.body.interview_id)?.questions).toEqual(["Question 1?"]);
  });

  test("missing fields are rejected with 400", async () => {
    const { app } = createTestApp();
    const res = await request(app)
      .post("/api/interview/start")
      .send({ sector: "business", experience_level: "entry" });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "position: Required" });
  });

  test("malformed JSON is rejected with 400", async () => {
    const { app } = createTestApp();
    const res = await request(app)
      .post("/api/interview/start")
      .set("Content-Type", "application/json")
      .send("{not json");
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "Malformed JSON body" });
  });

  test("generation failure is 500 with the provider message", async () => {
    muteConsoleError();
    const { app, llm } = createTestApp();
    llm.generateText.mockRejectedValueOnce(new Error("provider down"));

    const res = await request(app).post("/api/interview/start").send(START_BODY);
    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: "Error generating question: provider down" });
  });
});

describe("POST /api/interview/answer", () => {
  test("returns feedback and the next question", async () => {
    const { app } = createTestApp();
    const interviewId = await startInterview(app);

    const res = await request(app)
      .post("/api/interview/answer")
      .send({ interview_id: interviewId, question_number: 1, answer: "I would track retention." });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      feedback: "Solid answer.",
      strengths: ["clear", "structured"],
      improvements: ["add metrics"],
      score: 82,
      next_question: {
        question: "Question 2?",
        interview_id: interviewId,
        question_number: 2,
        total_questions: 5
      },
      interview_complete: false
    });
  });

  test("the fifth answer completes the interview", async () => {
    const { app } = createTestApp();
    const interviewId = await startInterview(app);
    const last = await answerAll(app, interviewId, 5);

    expect(last?.body.interview_complete).toBe(true);
    expect(last?.body.next_question).toBeNull();
  });

  test("unknown interview is 404", async () => {
    const { app } = createTestApp();
    const res = await request(app)
      .post("/api/interview/answer")
      .send({ interview_id: "missing", question_number: 1, answer: "x" });
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "Interview session not found" });
  });

  test("wrong question number is 400", async () => {
    const { app } = createTestApp();
    const interviewId = await startInterview(app);
    const res = await request(app)
      .post("/api/interview/answer")
      .send({ interview_id: interviewId, question_number: 3, answer: "x" });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "Invalid question number" });
  });

  test("non-numeric question number is 400", async () => {
    const { app } = createTestApp();
    const interviewId = await startInterview(app);
    const res = await request(app)
      .post("/api/interview/answer")
      .send({ interview_id: interviewId, question_number: "1", answer: "x" });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "question_number: Expected number, received string" });
  });

  test("feedback generation failure is 500", async () => {
    muteConsoleError();
    const { app, llm } = createTestApp();
    const interviewId = await startInterview(app);
    llm.generateText.mockRejectedValueOnce(new Error("timeout"));

    const res = await request(app)
      .post("/api/interview/answer")
      .send({ interview_id: interviewId, question_number: 1, answer: "x" });
    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: "Error generating feedback: timeout" });
  });
});

describe("GET /api/interview/:id/summary", () => {
  test("is 400 before the interview is complete", async () => {
    const { app } = createTestApp();
    const interviewId = await startInterview(app);
    const res = await request(app).get(`/api/interview/${interviewId}/summary`);
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "Interview not yet complete" });
  });

  test("returns the summary once complete", async () => {
    const { app } = createTestApp();
    const interviewId = await startInterview(app);
    await answerAll(app, interviewId, 5);

    const res = await request(app).get(`/api/interview/${interviewId}/summary`);
    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      summary: SUMMARY_REPLY,
      total_questions: 5,
      sector: "business",
      position: "Product Analyst"
    });
  });

  test("unknown interview is 404", async () => {
    const { app } = createTestApp();
    const res = await request(app).get("/api/interview/missing/summary");
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "Interview session not found" });
  });
});

describe("DELETE /api/interview/:id", () => {
  test("closes the session", async () => {
    const { app } = createTestApp();
    const interviewId = await startInterview(app);

    const res = await request(app).delete(`/api/interview/${interviewId}`);
    expect(res.status).toBe(204);

    const again = await request(app).delete(`/api/interview/${interviewId}`);
    expect(again.status).toBe(404);
    const summary = await request(app).get(`/api/interview/${interviewId}/summary`);
    expect(summary.status).toBe(404);
  });
});
