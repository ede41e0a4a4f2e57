import { describe, it, expect } from "vitest";
import { createEventBus } from "../../events/eventBus";
import { TranscriptContext } from "../../analysis/transcriptContext";
import { AnswerGenerator, FALLBACK_ANSWER_TEXT } from "../../analysis/answerGenerator";
import { ScriptedAnalyzer, finalSegment, testConfig } from "../helpers/fakes";
import type { AnswerEvent, PipelineErrorEvent, QuestionEvent } from "@shared/schema";

function question(id: string, questionText = "What is the capital of France?"): QuestionEvent {
  return {
    id,
    segmentId: "s1",
    questionText,
    detectedAt: "2026-01-01T09:00:00.000Z",
    confidence: 0.9,
    kind: "direct",
  };
}

function httpError(message: string, status: number): Error {
  return Object.assign(new Error(message), { status });
}

function setup(analyzer: ScriptedAnalyzer) {
  const bus = createEventBus();
  const transcript = new TranscriptContext();
  transcript.add(finalSegment("s1", 0, "So, what is the capital of France?"));

  const generator = new AnswerGenerator({
    bus,
    backend: analyzer,
    settings: testConfig().analysis,
    transcript,
    materials: () => "Capitals of Europe: Paris, Berlin, Madrid.",
  });

  const answers: AnswerEvent[] = [];
  const errors: PipelineErrorEvent[] = [];
  bus.subscribe("answer.generated", (answer) => { answers.push(answer); });
  bus.subscribe("pipeline.error", (error) => { errors.push(error); });

  const settle = async () => {
    await generator.drain(2000);
    await bus.idle();
  };

  return { bus, generator, answers, errors, settle };
}

describe("AnswerGenerator", () => {
  it("retries transient failures and publishes one answer", async () => {
    let calls = 0;
    const analyzer = new ScriptedAnalyzer().on("answer", () => {
      calls++;
      if (calls <= 2) throw httpError("Service Unavailable", 503);
      return "  Paris.  ";
    });
    const { generator, answers, errors, settle } = setup(analyzer);

    generator.onQuestion(question("q1"));
    await settle();

    expect(analyzer.callsFor("answer")).toHaveLength(3);
    expect(answers).toHaveLength(1);
    expect(answers[0]).toMatchObject({ questionEventId: "q1", answerText: "Paris.", fallback: false });
    expect(answers[0].supersedes).toBeUndefined();
    expect(errors).toEqual([]);
  });

  it("includes the transcript and course materials in the prompt", async () => {
    const analyzer = new ScriptedAnalyzer().on("answer", () => "Paris.");
    const { generator, settle } = setup(analyzer);

    generator.onQuestion(question("q1"));
    await settle();

    const [request] = analyzer.callsFor("answer");
    expect(request.user).toContain("The lecturer just asked: \"What is the capital of France?\"");
    expect(request.user).toContain("So, what is the capital of France?");
    expect(request.user).toContain("Capitals of Europe: Paris, Berlin, Madrid.");
  });

  it("publishes a fallback when retries run out", async () => {
    const analyzer = new ScriptedAnalyzer().on("answer", () => {
      throw httpError("Bad Gateway", 502);
    });
    const { generator, answers, errors, settle } = setup(analyzer);

    generator.onQuestion(question("q1"));
    await settle();

    expect(analyzer.callsFor("answer")).toHaveLength(3);
    expect(answers).toHaveLength(1);
    expect(answers[0]).toMatchObject({ questionEventId: "q1", answerText: FALLBACK_ANSWER_TEXT, fallback: true });
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({
      kind: "AnalysisFailure",
      component: "AnswerGenerator",
      message: "AnswerGenerator: Bad Gateway",
      detail: { questionEventId: "q1" },
    });
  });

  it("does not retry rejected credentials", async () => {
    const analyzer = new ScriptedAnalyzer().on("answer", () => {
      throw httpError("invalid api key", 401);
    });
    const { generator, answers, settle } = setup(analyzer);

    generator.onQuestion(question("q1"));
    await settle();

    expect(analyzer.callsFor("answer")).toHaveLength(1);
    expect(answers.map(answer => answer.fallback)).toEqual([true]);
  });

  it("answers a repeated question event once", async () => {
    const analyzer = new ScriptedAnalyzer().on("answer", () => "Paris.");
    const { generator, answers, settle } = setup(analyzer);

    generator.onQuestion(question("q1"));
    generator.onQuestion(question("q1"));
    await settle();

    expect(answers).toHaveLength(1);
    expect(generator.getStats().repeatsIgnored).toBe(1);
  });

  it("regenerates an answer that supersedes the previous one", async () => {
    const replies = ["Lyon.", "Paris."];
    const analyzer = new ScriptedAnalyzer().on("answer", () => replies.shift() ?? "unexpected");
    const { generator, answers, settle } = setup(analyzer);

    generator.onQuestion(question("q1"));
    await settle();
    expect(generator.regenerate("q1")).toBe(true);
    await settle();

    expect(answers.map(answer => answer.answerText)).toEqual(["Lyon.", "Paris."]);
    expect(answers[1].supersedes).toBe(answers[0].id);
    expect(answers[1].fallback).toBe(false);
    expect(generator.regenerate("unknown")).toBe(false);
  });

  it("keeps the current answer when a regeneration fails", async () => {
    let calls = 0;
    const analyzer = new ScriptedAnalyzer().on("answer", () => {
      calls++;
      if (calls === 1) return "Paris.";
      throw httpError("invalid api key", 401);
    });
    const { generator, answers, errors, settle } = setup(analyzer);

    generator.onQuestion(question("q1"));
    await settle();
    generator.regenerate("q1");
    await settle();

    expect(answers.map(answer => answer.answerText)).toEqual(["Paris."]);
    expect(errors).toHaveLength(1);
  });

  it("answers cancelled questions with a fallback", async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });
    const analyzer = new ScriptedAnalyzer().on("answer", async () => {
      await gate;
      return "Paris.";
    });
    const { generator, answers, settle } = setup(analyzer);

    generator.onQuestion(question("q1"));
    generator.onQuestion(question("q2", "What is the capital of Spain?"));
    expect(generator.cancelPending()).toBe(1);

    release();
    await settle();

    const byQuestion = Object.fromEntries(answers.map(answer => [answer.questionEventId, answer.answerText]));
    expect(byQuestion).toEqual({ q1: "Paris.", q2: FALLBACK_ANSWER_TEXT });
    expect(generator.hasAnswer("q2")).toBe(true);
  });
});
