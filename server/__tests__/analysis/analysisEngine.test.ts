import { describe, it, expect } from "vitest";
import { createEventBus } from "../../events/eventBus";
import { AnalysisEngine } from "../../analysis/analysisEngine";
import { FALLBACK_ANSWER_TEXT } from "../../analysis/answerGenerator";
import {
  NOT_A_QUESTION,
  ScriptedAnalyzer,
  delay,
  finalSegment,
  questionResponse,
  summaryResponse,
  testConfig,
  waitFor,
} from "../helpers/fakes";
import type { AnalysisSettings } from "../../config/pipeline";
import type { AnswerEvent, QuestionEvent, SummaryEvent } from "@shared/schema";

function lectureAnalyzer(): ScriptedAnalyzer {
  return new ScriptedAnalyzer()
    .on("question_detection", (request) =>
      request.user.includes("capital of France?")
        ? questionResponse("What is the capital of France?")
        : NOT_A_QUESTION
    )
    .on("answer", () => "Paris.")
    .on("summary", () => summaryResponse("Capitals of Europe."));
}

function setup(analyzer: ScriptedAnalyzer, settings: Partial<AnalysisSettings> = {}) {
  const bus = createEventBus();
  const engine = new AnalysisEngine({ bus, backend: analyzer, settings: testConfig({ analysis: settings }).analysis });

  const questions: QuestionEvent[] = [];
  const answers: AnswerEvent[] = [];
  const summaries: SummaryEvent[] = [];
  bus.subscribe("question.detected", (question) => { questions.push(question); });
  bus.subscribe("answer.generated", (answer) => { answers.push(answer); });
  bus.subscribe("summary.generated", (summary) => { summaries.push(summary); });

  return { bus, engine, questions, answers, summaries };
}

describe("AnalysisEngine", () => {
  it("routes finals to detection and detected questions to answers", async () => {
    const analyzer = lectureAnalyzer();
    const { bus, engine, questions, answers, summaries } = setup(analyzer);
    engine.setMaterials("Capitals of Europe: Paris, Berlin.");
    engine.start();

    bus.publish("transcript.segment", finalSegment("s1", 0, "Today we talk about capitals."));
    bus.publish("transcript.segment", finalSegment("s2", 1000, "So, what is the capital of France?"));
    await waitFor(() => answers.length === 1);

    expect(questions).toHaveLength(1);
    expect(answers[0]).toMatchObject({ questionEventId: questions[0].id, answerText: "Paris.", fallback: false });
    expect(analyzer.callsFor("answer")[0].user).toContain("Capitals of Europe: Paris, Berlin.");

    await engine.stop();
    await bus.idle();

    expect(summaries).toHaveLength(1);
    expect(summaries[0]).toMatchObject({ windowStart: 0, windowEnd: 2000, segmentCount: 2, text: "Capitals of Europe." });
  });

  it("ignores partials and repeated finals", async () => {
    const analyzer = lectureAnalyzer();
    const { bus, engine } = setup(analyzer);
    engine.start();

    bus.publish("transcript.segment", { ...finalSegment("s1", 0, "Today we"), isFinal: false });
    bus.publish("transcript.segment", finalSegment("s1", 0, "Today we talk about capitals."));
    bus.publish("transcript.segment", finalSegment("s1", 0, "Today we talk about capitals."));
    await bus.idle();
    await engine.questions.drain(1000);

    expect(engine.transcript.finalCount).toBe(1);
    expect(analyzer.callsFor("question_detection")).toHaveLength(1);
    await engine.stop();
  });

  it("keeps the transcript but skips detection while paused", async () => {
    const analyzer = lectureAnalyzer();
    const { bus, engine, questions, summaries } = setup(analyzer);
    engine.start();

    bus.publish("transcript.segment", finalSegment("s1", 0, "Today we talk about capitals."));
    await bus.idle();
    await engine.questions.drain(1000);

    engine.pause();
    bus.publish("transcript.segment", finalSegment("s2", 1000, "So, what is the capital of France?"));
    await bus.idle();

    expect(analyzer.callsFor("question_detection")).toHaveLength(1);
    expect(engine.transcript.finalCount).toBe(2);

    engine.resume();
    await engine.stop();
    await bus.idle();

    expect(questions).toHaveLength(0);
    expect(summaries.map(summary => summary.segmentCount)).toEqual([2]);
  });

  it("does not answer when auto answers are off", async () => {
    const analyzer = lectureAnalyzer();
    const { bus, engine, questions, answers } = setup(analyzer, { autoAnswer: false });
    engine.start();

    bus.publish("transcript.segment", finalSegment("s1", 0, "So, what is the capital of France?"));
    await waitFor(() => questions.length === 1);
    await engine.stop();
    await bus.idle();

    expect(answers).toHaveLength(0);
    expect(analyzer.callsFor("answer")).toHaveLength(0);
  });

  it("falls back for queued and running answers once the shutdown timeout passes", async () => {
    const analyzer = new ScriptedAnalyzer().on("answer", async () => {
      await delay(200);
      return "Too late.";
    });
    const { bus, engine, answers } = setup(analyzer, { questionDetection: false, shutdownTimeoutMs: 50 });
    engine.start();

    for (const id of ["q1", "q2", "q3"]) {
      bus.publish("question.detected", {
        id,
        segmentId: `s-${id}`,
        questionText: `Question ${id}?`,
        detectedAt: "2026-03-02T09:00:00.000Z",
        confidence: 0.9,
        kind: "direct",
      });
    }
    await waitFor(() => analyzer.callsFor("answer").length === 1);

    await engine.stop();

    expect(analyzer.callsFor("answer")).toHaveLength(1);
    expect(answers.map(answer => [answer.questionEventId, answer.answerText, answer.fallback]).sort()).toEqual([
      ["q1", FALLBACK_ANSWER_TEXT, true],
      ["q2", FALLBACK_ANSWER_TEXT, true],
      ["q3", FALLBACK_ANSWER_TEXT, true],
    ]);

    await delay(300);
    await bus.idle();

    expect(analyzer.callsFor("answer")).toHaveLength(1);
    expect(answers).toHaveLength(3);
  });

  it("publishes a fallback for a summary still running at the shutdown timeout", async () => {
    const analyzer = new ScriptedAnalyzer().on("summary", async () => {
      await delay(300);
      return summaryResponse("Too late.");
    });
    const { bus, engine, summaries } = setup(analyzer, { questionDetection: false, shutdownTimeoutMs: 100 });
    engine.start();

    bus.publish("transcript.segment", finalSegment("s1", 0, "Today we talk about capitals."));
    await bus.idle();

    await engine.stop();

    expect(summaries).toHaveLength(1);
    expect(summaries[0]).toMatchObject({
      windowStart: 0,
      windowEnd: 1000,
      segmentCount: 1,
      title: "Summary unavailable",
      text: "Today we talk about capitals.",
      fallback: true,
    });

    await delay(400);
    await bus.idle();
    expect(summaries).toHaveLength(1);
  });

  it("suspends the periodic timers while paused", async () => {
    const analyzer = lectureAnalyzer().on("suggestion", () => JSON.stringify({ question: "Why Paris?" }));
    const { bus, engine } = setup(analyzer, {
      questionDetection: false,
      periodicSuggestions: true,
      suggestionIntervalMs: 40,
      suggestionMinSegments: 0,
      summaryIntervalMs: 40,
      summaryIdleCheckMs: 10,
    });
    engine.start();

    bus.publish("transcript.segment", finalSegment("s1", 0, "Today we talk about capitals."));
    await bus.idle();
    engine.pause();

    await delay(150);
    expect(analyzer.callsFor("suggestion")).toHaveLength(0);
    expect(analyzer.callsFor("summary")).toHaveLength(0);

    engine.resume();
    await waitFor(() => analyzer.callsFor("suggestion").length === 1 && analyzer.callsFor("summary").length === 1);

    await engine.stop();
  });

  it("stops listening for segments after stop", async () => {
    const analyzer = lectureAnalyzer();
    const { bus, engine } = setup(analyzer);
    engine.start();
    await engine.stop();

    bus.publish("transcript.segment", finalSegment("s1", 0, "Anything left?"));
    await bus.idle();

    expect(engine.transcript.finalCount).toBe(0);
    expect(analyzer.calls).toHaveLength(0);
  });
});
