import { describe, it, expect } from "vitest";
import { createEventBus } from "../../events/eventBus";
import {
  AlertRouter,
  ConsoleNotificationSink,
  answerAlert,
  formatAlert,
  ideaAlert,
  lifecycleAlert,
  questionAlert,
  summaryAlert,
} from "../../notifications/alertRouter";
import type { Alert, NotificationSink } from "../../notifications/alertRouter";
import type { AnswerEvent, QuestionEvent } from "@shared/schema";

const QUESTION: QuestionEvent = {
  id: "q1",
  segmentId: "s1",
  questionText: "What is a derivative?",
  detectedAt: "2026-03-02T09:01:00.000Z",
  confidence: 0.87,
  kind: "direct",
};

const ANSWER: AnswerEvent = {
  id: "a1",
  questionEventId: "q1",
  answerText: "The instantaneous rate of change.",
  generatedAt: "2026-03-02T09:01:02.000Z",
  modelLatencyMs: 800,
  fallback: false,
};

class RecordingSink implements NotificationSink {
  readonly name = "recording";
  readonly alerts: Alert[] = [];

  async send(alert: Alert): Promise<void> {
    this.alerts.push(alert);
  }
}

class FailingSink implements NotificationSink {
  readonly name = "failing";

  async send(): Promise<void> {
    throw new Error("sink offline");
  }
}

describe("alert formatting", () => {
  it("formats questions with kind and rounded confidence", () => {
    expect(questionAlert(QUESTION)).toEqual({ level: "question", title: "Question (direct, 87%)", body: "What is a derivative?" });
  });

  it("pairs answers with their question and marks replacements", () => {
    expect(answerAlert(ANSWER, "What is a derivative?").body).toBe(
      "Q: What is a derivative?\nA: The instantaneous rate of change."
    );
    expect(answerAlert({ ...ANSWER, supersedes: "a0" }).title).toBe("Answer (regenerated)");
    expect(answerAlert({ ...ANSWER, fallback: true }).title).toBe("Answer (unavailable)");
  });

  it("shows the summary range and key points", () => {
    const alert = summaryAlert({
      id: "m1",
      windowStart: 0,
      windowEnd: 600_000,
      segmentCount: 40,
      title: "Derivatives",
      text: "Introduced derivatives.",
      keyPoints: ["limits", "slopes"],
      generatedAt: "2026-03-02T09:10:00.000Z",
      fallback: false,
    });

    expect(alert.title).toBe("Summary 00:00-10:00: Derivatives");
    expect(alert.body).toBe("Introduced derivatives.\n  - limits\n  - slopes");
  });

  it("lists each idea group with its marker", () => {
    const alert = ideaAlert({
      id: "i1",
      ideas: [{ idea: "Plot it", detail: "" }],
      deepLearning: [{ topic: "Taylor series", reason: "next step" }],
      crossDiscipline: [{ field: "Physics", connection: "velocity" }],
      generatedAt: "2026-03-02T09:12:00.000Z",
    });

    expect(alert.body).toBe("  - Plot it\n  > Taylor series: next step\n  ~ Physics: velocity");
  });

  it("alerts only on health lifecycle events", () => {
    const base = { sessionId: "x", at: "2026-03-02T09:00:00.000Z" };
    expect(lifecycleAlert({ ...base, type: "degraded", reason: "connection lost" })).toEqual({
      level: "error",
      title: "Transcription degraded",
      body: "connection lost",
    });
    expect(lifecycleAlert({ ...base, type: "started" })).toBeNull();
  });

  it("writes a block per alert to the console sink", async () => {
    const written: string[] = [];
    const sink = new ConsoleNotificationSink(text => written.push(text));

    await sink.send({ level: "info", title: "Transcription recovered", body: "" });

    expect(written).toEqual(["\n[i] Transcription recovered\n\n"]);
    expect(formatAlert({ level: "idea", title: "Ideas", body: "x" })).toBe("\n[+] Ideas\nx\n");
  });
});

describe("AlertRouter", () => {
  it("routes bus events to the sink and remembers question text", async () => {
    const bus = createEventBus();
    const sink = new RecordingSink();
    const router = new AlertRouter(bus, sink);
    router.start();

    bus.publish("question.detected", QUESTION);
    await bus.idle();
    bus.publish("answer.generated", ANSWER);
    bus.publish("session.lifecycle", { type: "paused", sessionId: "x", at: "2026-03-02T09:00:00.000Z" });
    bus.publish("pipeline.error", {
      kind: "AnalysisFailure",
      component: "Summarizer",
      message: "Summarizer: timed out",
      at: "2026-03-02T09:00:00.000Z",
    });
    await bus.idle();

    expect(sink.alerts.map(alert => alert.title)).toEqual([
      "Question (direct, 87%)",
      "Answer",
      "AnalysisFailure in Summarizer",
    ]);
    expect(sink.alerts[1].body).toBe("Q: What is a derivative?\nA: The instantaneous rate of change.");
    expect(router.getStats()).toEqual({ sent: 3, failed: 0 });
  });

  it("leaves pipeline errors out when asked", async () => {
    const bus = createEventBus();
    const sink = new RecordingSink();
    new AlertRouter(bus, sink, { includeErrors: false }).start();

    bus.publish("pipeline.error", { kind: "ProtocolError", component: "stt", message: "bad frame", at: "2026-03-02T09:00:00.000Z" });
    await bus.idle();

    expect(sink.alerts).toEqual([]);
  });

  it("counts sink failures without affecting other subscribers", async () => {
    const bus = createEventBus();
    const router = new AlertRouter(bus, new FailingSink());
    const seen: string[] = [];
    router.start();
    bus.subscribe("question.detected", (question) => { seen.push(question.id); });

    bus.publish("question.detected", QUESTION);
    await bus.idle();

    expect(seen).toEqual(["q1"]);
    expect(router.getStats()).toEqual({ sent: 0, failed: 1 });

    router.stop();
    bus.publish("question.detected", QUESTION);
    await bus.idle();
    expect(router.getStats()).toEqual({ sent: 0, failed: 1 });
  });
});
