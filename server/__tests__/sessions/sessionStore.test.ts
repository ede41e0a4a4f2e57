import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { createEventBus } from "../../events/eventBus";
import { PersistenceError } from "../../errors";
import { SessionStore, appendFully, describeSession, formatTimestamp, safeDirName, sessionDirName } from "../../sessions/sessionStore";
import { finalSegment } from "../helpers/fakes";
import type { EventBus } from "../../events/eventBus";
import type { AnswerEvent, QuestionEvent, Session } from "@shared/schema";

const EXTRAS = { outputLanguage: "en", sourceLanguage: "en", summaryIntervalMs: 600_000 };

function lecture(overrides: Partial<Session> = {}): Session {
  return {
    id: "0f8c2a1e-5b7d-4c1a-9e2f-123456789abc",
    name: "Intro to AI: Week 1!",
    description: "",
    createdAt: "2026-03-02T09:00:00.000Z",
    materialsRefs: [],
    state: "Active",
    ...overrides,
  };
}

function question(id: string): QuestionEvent {
  return { id, segmentId: "s1", questionText: "Why?", detectedAt: "2026-03-02T09:01:00.000Z", confidence: 0.9, kind: "direct" };
}

function answer(id: string, questionEventId: string, answerText: string, supersedes?: string): AnswerEvent {
  return {
    id,
    questionEventId,
    answerText,
    generatedAt: "2026-03-02T09:01:05.000Z",
    modelLatencyMs: 120,
    fallback: false,
    supersedes,
  };
}

async function readJson(filePath: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(filePath, "utf-8"));
}

describe("session directory helpers", () => {
  it("builds a readable directory name", () => {
    expect(safeDirName("Intro to AI: Week 1!")).toBe("Intro_to_AI_Week_1");
    expect(safeDirName("???")).toBe("session");
    expect(sessionDirName(lecture())).toBe("2026-03-02_Intro_to_AI_Week_1_0f8c2a1e");
  });

  it("formats media time as mm:ss", () => {
    expect(formatTimestamp(125_400)).toBe("02:05");
    expect(formatTimestamp(-5)).toBe("00:00");
  });

  it("describes a stored session on one line", () => {
    const meta = { ...lecture({ name: "Calculus", state: "Ended" }), ...EXTRAS, dir: "/data/calculus" };
    expect(describeSession(meta)).toBe("2026-03-02 09:00  Ended    Calculus (/data/calculus)");
  });

  it("resumes an interrupted append after the bytes already written", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "lecture-append-"));
    const file = path.join(dir, "full_transcript.txt");
    await fs.writeFile(file, "[00:01] Hel");

    const progress = { written: Buffer.byteLength("[00:01] Hel") };
    await appendFully(file, "[00:01] Hello.\n", progress);
    await appendFully(file, "[00:01] Hello.\n", progress);

    expect(await fs.readFile(file, "utf-8")).toBe("[00:01] Hello.\n");
    expect(progress.written).toBe(15);
    await fs.rm(dir, { recursive: true, force: true });
  });
});

describe("SessionStore", () => {
  let dataDir: string;
  let bus: EventBus;
  let store: SessionStore;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), "lecture-store-"));
    bus = createEventBus();
    store = new SessionStore({ dataDir, persistAudio: false, writeRetries: 1, writeRetryDelayMs: 1 });
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  async function settle(): Promise<void> {
    await bus.idle();
    await store.flush();
  }

  it("creates the session layout and meta.json", async () => {
    const paths = await store.open(lecture(), EXTRAS);

    expect(paths.root).toBe(path.join(dataDir, "2026-03-02_Intro_to_AI_Week_1_0f8c2a1e"));
    for (const dir of [paths.materials, paths.transcripts, paths.analysis, paths.audio]) {
      expect((await fs.stat(dir)).isDirectory()).toBe(true);
    }
    expect(await readJson(paths.meta)).toMatchObject({
      name: "Intro to AI: Week 1!",
      state: "Active",
      outputLanguage: "en",
      summaryIntervalMs: 600_000,
      dir: paths.root,
    });
  });

  it("appends each final once to both transcript files", async () => {
    const paths = await store.open(lecture(), EXTRAS);
    store.attach(bus);

    bus.publish("transcript.segment", { ...finalSegment("s1", 65_000, "Hel"), isFinal: false });
    bus.publish("transcript.segment", finalSegment("s1", 65_000, "Hello everyone."));
    bus.publish("transcript.segment", finalSegment("s1", 65_000, "Hello everyone."));
    bus.publish("transcript.segment", finalSegment("s2", 66_500, "Let's begin."));
    await settle();

    const realtime = (await fs.readFile(paths.realtime, "utf-8")).trim().split("\n");
    expect(realtime.map(line => JSON.parse(line).id)).toEqual(["s1", "s2"]);
    expect(await fs.readFile(paths.fullTranscript, "utf-8")).toBe("[01:05] Hello everyone.\n[01:06] Let's begin.\n");
  });

  it("pairs answers with questions in either order and keeps replaced answers", async () => {
    const paths = await store.open(lecture(), EXTRAS);
    store.attach(bus);

    bus.publish("answer.generated", answer("a1", "q1", "First try."));
    await settle();
    bus.publish("question.detected", question("q1"));
    await settle();
    bus.publish("answer.generated", answer("a2", "q1", "Better answer.", "a1"));
    await settle();
    bus.publish("answer.generated", answer("a3", "q1", "Stray duplicate."));
    await settle();

    const records = await readJson(paths.questions);
    expect(records).toEqual([
      {
        question: question("q1"),
        answer: answer("a2", "q1", "Better answer.", "a1"),
        replacedAnswers: ["a1"],
      },
    ]);
  });

  it("writes analysis collections and the event log", async () => {
    const paths = await store.open(lecture(), EXTRAS);
    store.attach(bus);

    bus.publish("audio.frame", { seq: 0, data: Buffer.alloc(4), capturedAt: 0 });
    bus.publish("suggestion.generated", {
      id: "g1",
      question: "How does this scale?",
      rationale: "",
      timing: "",
      trigger: "request",
      generatedAt: "2026-03-02T09:02:00.000Z",
    });
    await settle();

    expect(await readJson(paths.suggestions)).toMatchObject([{ id: "g1", question: "How does this scale?" }]);
    const events = (await fs.readFile(paths.events, "utf-8")).trim().split("\n").map(line => JSON.parse(line).topic);
    expect(events).toEqual(["suggestion.generated"]);
    await expect(fs.stat(paths.recording)).rejects.toThrow();
  });

  it("records raw audio when enabled", async () => {
    store = new SessionStore({ dataDir, persistAudio: true, writeRetries: 1, writeRetryDelayMs: 1 });
    const paths = await store.open(lecture(), EXTRAS);
    store.attach(bus);

    bus.publish("audio.frame", { seq: 0, data: Buffer.alloc(320, 1), capturedAt: 0 });
    bus.publish("audio.frame", { seq: 1, data: Buffer.alloc(320, 2), capturedAt: 0 });
    await settle();

    expect((await fs.readFile(paths.recording)).length).toBe(640);
  });

  it("marks the session ended and refuses later writes", async () => {
    const paths = await store.open(lecture(), EXTRAS);
    store.attach(bus);

    await store.finalize(lecture({ endedAt: "2026-03-02T10:30:00.000Z" }));
    expect(store.isFinalized).toBe(true);
    expect(await readJson(paths.meta)).toMatchObject({ state: "Ended", endedAt: "2026-03-02T10:30:00.000Z" });

    bus.publish("transcript.segment", finalSegment("s1", 0, "Too late."));
    await settle();
    await expect(fs.stat(paths.realtime)).rejects.toThrow();

    const material = path.join(dataDir, "notes.txt");
    await fs.writeFile(material, "notes");
    await expect(store.addMaterial(material)).rejects.toBeInstanceOf(PersistenceError);
  });

  it("copies materials into the session", async () => {
    const paths = await store.open(lecture(), EXTRAS);
    const material = path.join(dataDir, "syllabus.md");
    await fs.writeFile(material, "# Syllabus");

    const copied = await store.addMaterial(material);

    expect(copied).toBe(path.join(paths.materials, "syllabus.md"));
    expect(await fs.readFile(copied, "utf-8")).toBe("# Syllabus");
    await expect(store.addMaterial(path.join(dataDir, "missing.pdf"))).rejects.toThrow("Failed to add material");
  });

  it("lists stored sessions and skips invalid entries", async () => {
    const first = await store.open(lecture(), EXTRAS);
    const second = await new SessionStore({ dataDir, persistAudio: false, writeRetries: 1, writeRetryDelayMs: 1 })
      .open(lecture({ id: "9a9a9a9a-0000-4000-8000-000000000000", name: "Calculus" }), EXTRAS);

    await fs.mkdir(path.join(dataDir, "empty"));
    await fs.mkdir(path.join(dataDir, "broken"));
    await fs.writeFile(path.join(dataDir, "broken", "meta.json"), "{not json");
    await fs.mkdir(path.join(dataDir, "partial"));
    await fs.writeFile(path.join(dataDir, "partial", "meta.json"), JSON.stringify({ id: "x" }));

    const sessions = await SessionStore.listSessions(dataDir);

    expect(sessions.map(session => session.name)).toEqual(["Calculus", "Intro to AI: Week 1!"]);
    expect(sessions.map(session => session.dir)).toEqual([
      path.join(dataDir, path.basename(second.root)),
      path.join(dataDir, path.basename(first.root)),
    ]);
    expect(await SessionStore.listSessions(path.join(dataDir, "nowhere"))).toEqual([]);
  });
});
