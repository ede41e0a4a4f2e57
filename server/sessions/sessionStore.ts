/**
 * Session Store
 *
 * Durable copy of one classroom session on disk:
 *
 *   <dataDir>/<YYYY-MM-DD>_<name>_<id8>/
 *   ├── meta.json
 *   ├── materials/
 *   ├── transcripts/
 *   │   ├── realtime.jsonl        one line per final segment
 *   │   └── full_transcript.txt   "[mm:ss] text" per final segment
 *   ├── analysis/
 *   │   ├── questions.json        questions with their current answer
 *   │   ├── summaries.json
 *   │   ├── suggestions.json
 *   │   └── ideas.json
 *   ├── audio/recording.pcm       only with persistAudio
 *   └── events.jsonl              every bus event except audio frames
 *
 * All writes go through one promise chain. Appends track how many bytes
 * reached the file, so a retry resumes where a short or failed write stopped;
 * collections are written to a temp file and renamed over the target.
 */

import { promises as fs } from "fs";
import path from "path";
import { log, errorMessage } from "../logger";
import { withRetry } from "../../lib/reliability";
import { PersistenceError } from "../errors";
import { publishLifecycle, reportPipelineError } from "../events/reporting";
import { allTopics, sessionMetaSchema } from "@shared/schema";
import type { EventBus, SubscriptionHandle } from "../events/eventBus";
import type { StorageSettings } from "../config/pipeline";
import type {
  AnswerEvent,
  AudioFrame,
  IdeaEvent,
  QuestionEvent,
  Session,
  SessionMeta,
  SuggestionEvent,
  SummaryEvent,
  Topic,
  TopicMap,
  TranscriptSegment,
} from "@shared/schema";

export interface SessionPaths {
  root: string;
  meta: string;
  materials: string;
  transcripts: string;
  analysis: string;
  audio: string;
  realtime: string;
  fullTranscript: string;
  questions: string;
  summaries: string;
  suggestions: string;
  ideas: string;
  events: string;
  recording: string;
}

export interface QuestionRecord {
  question: QuestionEvent | null;
  answer: AnswerEvent | null;
  replacedAnswers: string[];
}

export type SessionMetaExtras = Pick<SessionMeta, "outputLanguage" | "sourceLanguage" | "summaryIntervalMs">;

export type StoreOptions = Pick<StorageSettings, "dataDir" | "persistAudio" | "writeRetries" | "writeRetryDelayMs">;

export function safeDirName(name: string): string {
  const cleaned = name
    .trim()
    .replace(/[^\p{L}\p{N}\-_]+/gu, "_")
    .replace(/_+/g, "_")
    .replace(/^_|_$/g, "")
    .slice(0, 60);
  return cleaned || "session";
}

export function sessionDirName(session: Pick<Session, "id" | "name" | "createdAt">): string {
  const date = session.createdAt.slice(0, 10);
  const shortId = session.id.replace(/-/g, "").slice(0, 8);
  return `${date}_${safeDirName(session.name)}_${shortId}`;
}

export function formatTimestamp(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${String(minutes).padStart(2, "0")}:${String(seconds).padStart(2, "0")}`;
}

export function sessionPaths(root: string): SessionPaths {
  const transcripts = path.join(root, "transcripts");
  const analysis = path.join(root, "analysis");
  const audio = path.join(root, "audio");
  return {
    root,
    meta: path.join(root, "meta.json"),
    materials: path.join(root, "materials"),
    transcripts,
    analysis,
    audio,
    realtime: path.join(transcripts, "realtime.jsonl"),
    fullTranscript: path.join(transcripts, "full_transcript.txt"),
    questions: path.join(analysis, "questions.json"),
    summaries: path.join(analysis, "summaries.json"),
    suggestions: path.join(analysis, "suggestions.json"),
    ideas: path.join(analysis, "ideas.json"),
    events: path.join(root, "events.jsonl"),
    recording: path.join(audio, "recording.pcm"),
  };
}

let tempCounter = 0;

export interface AppendProgress {
  written: number;
}

/** Appends the bytes of `data` not yet counted in `progress` */
export async function appendFully(filePath: string, data: string | Buffer, progress: AppendProgress): Promise<void> {
  const bytes = typeof data === "string" ? Buffer.from(data, "utf-8") : data;
  if (progress.written >= bytes.length) return;

  const handle = await fs.open(filePath, "a");
  try {
    while (progress.written < bytes.length) {
      const { bytesWritten } = await handle.write(bytes, progress.written, bytes.length - progress.written);
      progress.written += bytesWritten;
    }
  } finally {
    await handle.close();
  }
}

/** One line of the `sessions` listing */
export function describeSession(meta: SessionMeta): string {
  const created = meta.createdAt.slice(0, 16).replace("T", " ");
  return `${created}  ${meta.state.padEnd(7)}  ${meta.name} (${meta.dir ?? meta.id})`;
}

async function writeJsonAtomic(filePath: string, json: string): Promise<void> {
  const tempPath = `${filePath}.${process.pid}.${++tempCounter}.tmp`;
  await fs.writeFile(tempPath, json, "utf-8");
  await fs.rename(tempPath, filePath);
}

export class SessionStore {
  private paths: SessionPaths | null = null;
  private meta: SessionMeta | null = null;
  private bus: EventBus | null = null;
  private subscriptions: SubscriptionHandle[] = [];
  private writeChain: Promise<void> = Promise.resolve();
  private finalized = false;

  private readonly finalIds = new Set<string>();
  private readonly warnedPaths = new Set<string>();
  private readonly questionRecords: QuestionRecord[] = [];
  private readonly summaries: SummaryEvent[] = [];
  private readonly suggestions: SuggestionEvent[] = [];
  private readonly ideas: IdeaEvent[] = [];

  private stats = {
    writes: 0,
    retries: 0,
    failures: 0,
  };

  constructor(private readonly options: StoreOptions) {}

  get sessionPaths(): SessionPaths | null {
    return this.paths;
  }

  get isFinalized(): boolean {
    return this.finalized;
  }

  async open(session: Session, extras: SessionMetaExtras): Promise<SessionPaths> {
    const root = path.resolve(this.options.dataDir, sessionDirName(session));
    const paths = sessionPaths(root);

    try {
      for (const dir of [paths.materials, paths.transcripts, paths.analysis, paths.audio]) {
        await fs.mkdir(dir, { recursive: true });
      }
      this.meta = { ...session, ...extras, dir: root };
      await writeJsonAtomic(paths.meta, JSON.stringify(this.meta, null, 2));
    } catch (error) {
      throw new PersistenceError(root, `Failed to create session directory: ${errorMessage(error)}`, { cause: error });
    }

    this.paths = paths;
    log(`[SessionStore] Session directory ready: ${root}`, "store");
    return paths;
  }

  private requirePaths(): SessionPaths {
    if (!this.paths) {
      throw new PersistenceError(this.options.dataDir, "Session store is not open");
    }
    return this.paths;
  }

  /** Subscribe to every topic on the bus */
  attach(bus: EventBus): void {
    this.requirePaths();
    this.bus = bus;

    for (const topic of allTopics) {
      if (topic === "audio.frame") continue;
      this.subscriptions.push(this.subscribeEventLog(bus, topic));
    }

    this.subscriptions.push(
      bus.subscribe("transcript.segment", (segment) => this.onSegment(segment), "store.transcript"),
      bus.subscribe("question.detected", (question) => this.onQuestion(question), "store.questions"),
      bus.subscribe("answer.generated", (answer) => this.onAnswer(answer), "store.answers"),
      bus.subscribe("summary.generated", (summary) => this.onCollection("summaries", this.summaries, summary), "store.summaries"),
      bus.subscribe("suggestion.generated", (suggestion) => this.onCollection("suggestions", this.suggestions, suggestion), "store.suggestions"),
      bus.subscribe("idea.generated", (idea) => this.onCollection("ideas", this.ideas, idea), "store.ideas")
    );

    if (this.options.persistAudio) {
      this.subscriptions.push(bus.subscribe("audio.frame", (frame) => this.onAudio(frame), "store.audio"));
    }
  }

  private subscribeEventLog<T extends Topic>(bus: EventBus, topic: T): SubscriptionHandle {
    return bus.subscribe(topic, (event: TopicMap[T]) => {
      const line = JSON.stringify({ topic, at: new Date().toISOString(), event });
      this.append(this.requirePaths().events, `${line}\n`);
    }, `store.events.${topic}`);
  }

  detach(): void {
    if (!this.bus) return;
    for (const handle of this.subscriptions) {
      this.bus.unsubscribe(handle);
    }
    this.subscriptions = [];
  }

  private onSegment(segment: TranscriptSegment): void {
    if (!segment.isFinal || this.finalIds.has(segment.id)) return;
    this.finalIds.add(segment.id);

    const paths = this.requirePaths();
    this.append(paths.realtime, `${JSON.stringify(segment)}\n`);
    this.append(paths.fullTranscript, `[${formatTimestamp(segment.startTime)}] ${segment.text}\n`);
  }

  private onQuestion(question: QuestionEvent): void {
    const existing = this.questionRecords.find(record =>
      record.question?.id === question.id || record.answer?.questionEventId === question.id
    );

    if (existing) {
      if (existing.question) return;
      existing.question = question;
    } else {
      this.questionRecords.push({ question, answer: null, replacedAnswers: [] });
    }
    this.writeQuestions();
  }

  private onAnswer(answer: AnswerEvent): void {
    const record = this.questionRecords.find(item =>
      item.question?.id === answer.questionEventId || item.answer?.questionEventId === answer.questionEventId
    );

    if (!record) {
      // Answers may overtake their question across topics
      this.questionRecords.push({ question: null, answer, replacedAnswers: [] });
    } else if (!record.answer) {
      record.answer = answer;
    } else if (answer.supersedes !== undefined) {
      record.replacedAnswers.push(record.answer.id);
      record.answer = answer;
    } else {
      log(`[SessionStore] Ignoring second answer for question ${answer.questionEventId}`, "store", "debug");
      return;
    }
    this.writeQuestions();
  }

  private writeQuestions(): void {
    this.writeJson(this.requirePaths().questions, this.questionRecords);
  }

  private onCollection<T>(name: "summaries" | "suggestions" | "ideas", items: T[], item: T): void {
    items.push(item);
    this.writeJson(this.requirePaths()[name], items);
  }

  private onAudio(frame: AudioFrame): void {
    this.append(this.requirePaths().recording, frame.data);
  }

  private append(filePath: string, data: string | Buffer): void {
    const progress: AppendProgress = { written: 0 };
    this.enqueueWrite(filePath, () => appendFully(filePath, data, progress));
  }

  private writeJson(filePath: string, value: unknown): void {
    // Serialize now so the file reflects the collection at this point in the stream
    const json = JSON.stringify(value, null, 2);
    this.enqueueWrite(filePath, () => writeJsonAtomic(filePath, json));
  }

  private enqueueWrite(filePath: string, write: () => Promise<void>): void {
    if (this.finalized) {
      log(`[SessionStore] Write to ${path.basename(filePath)} refused, session is finalized`, "store", "warn");
      return;
    }
    this.writeChain = this.writeChain.then(() => this.runWrite(filePath, write));
  }

  private async runWrite(filePath: string, write: () => Promise<void>): Promise<void> {
    try {
      await withRetry(write, {
        maxRetries: this.options.writeRetries,
        baseDelayMs: this.options.writeRetryDelayMs,
        maxDelayMs: this.options.writeRetryDelayMs * 10,
        jitterFactor: 0,
        retryOn: () => true,
        onRetry: () => {
          this.stats.retries++;
        },
      });
      this.stats.writes++;
    } catch (error) {
      this.stats.failures++;
      const failure = new PersistenceError(filePath, errorMessage(error), { cause: error });
      log(`[SessionStore] Write failed after retries: ${failure.message}`, "store", "error");

      // One warning per file, so a failing event log cannot feed on its own warnings
      if (this.bus && this.meta && !this.warnedPaths.has(filePath)) {
        this.warnedPaths.add(filePath);
        publishLifecycle(this.bus, this.meta.id, "warning", `persistence failed for ${path.basename(filePath)}`);
        reportPipelineError(this.bus, "store", failure);
      }
    }
  }

  /** Resolves once every write queued so far has settled */
  flush(): Promise<void> {
    return this.writeChain;
  }

  async saveMeta(session: Session): Promise<void> {
    const paths = this.requirePaths();
    if (!this.meta) return;
    this.meta = { ...this.meta, ...session };
    this.writeJson(paths.meta, this.meta);
    await this.flush();
  }

  /** Copy a material file into the session's materials directory */
  async addMaterial(filePath: string): Promise<string> {
    const paths = this.requirePaths();
    if (this.finalized) {
      throw new PersistenceError(paths.materials, "Session is finalized");
    }

    const destination = path.join(paths.materials, path.basename(filePath));
    try {
      await fs.copyFile(filePath, destination);
    } catch (error) {
      throw new PersistenceError(filePath, `Failed to add material: ${errorMessage(error)}`, { cause: error });
    }

    log(`[SessionStore] Material added: ${destination}`, "store");
    return destination;
  }

  /**
   * Drains pending writes and marks the session Ended on disk. Further
   * writes are refused.
   */
  async finalize(session: Session): Promise<void> {
    if (this.finalized) return;
    this.detach();

    const ended: Session = {
      ...session,
      state: "Ended",
      endedAt: session.endedAt ?? new Date().toISOString(),
    };
    await this.saveMeta(ended);
    this.finalized = true;

    log(
      `[SessionStore] Session ${session.id} finalized (${this.stats.writes} writes, ${this.stats.failures} failed)`,
      "store"
    );
  }

  getQuestionRecords(): readonly QuestionRecord[] {
    return this.questionRecords;
  }

  getStats() {
    return { ...this.stats };
  }

  static async listSessions(dataDir: string): Promise<SessionMeta[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(dataDir);
    } catch (error) {
      log(`[SessionStore] No sessions under ${dataDir}: ${errorMessage(error)}`, "store", "debug");
      return [];
    }

    const sessions: SessionMeta[] = [];
    for (const entry of entries.sort()) {
      const dir = path.join(dataDir, entry);
      const metaPath = path.join(dir, "meta.json");

      let raw: string;
      try {
        raw = await fs.readFile(metaPath, "utf-8");
      } catch (error) {
        log(`[SessionStore] Skipping ${entry}: ${errorMessage(error)}`, "store", "debug");
        continue;
      }

      let payload: unknown;
      try {
        payload = JSON.parse(raw);
      } catch (error) {
        log(`[SessionStore] Skipping ${entry}: invalid meta.json (${errorMessage(error)})`, "store", "warn");
        continue;
      }

      const parsed = sessionMetaSchema.safeParse(payload);
      if (!parsed.success) {
        log(`[SessionStore] Skipping ${entry}: meta.json does not match schema`, "store", "warn");
        continue;
      }
      sessions.push({ ...parsed.data, dir });
    }

    return sessions;
  }
}
