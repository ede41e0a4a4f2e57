/**
 * Classroom Engine
 *
 * Owns one classroom session and drives it through its lifecycle:
 *
 *   Created --start--> Active <--pause/resume--> Paused
 *   Active | Paused --end--> Ended
 *
 * Wiring for a running session:
 *   AudioSource -> pump -> TranscriptionChannel -> bus (transcript.segment)
 *   bus -> AnalysisEngine -> bus (question/answer/summary/suggestion/idea)
 *   bus -> SessionStore
 *
 * Control actions are checked against the state the session will be in once
 * earlier actions finish, rejected synchronously when invalid, and run one at
 * a time on a single chain.
 */

import { v4 as uuidv4 } from "uuid";
import { log, errorMessage } from "../logger";
import { ChannelClosedError, InvalidStateTransitionError, isPipelineError, PersistenceError } from "../errors";
import { createEventBus } from "../events/eventBus";
import { publishLifecycle, reportPipelineError } from "../events/reporting";
import { TranscriptionChannel } from "../stt/transcriptionChannel";
import { AnalysisEngine } from "../analysis/analysisEngine";
import { withTimeout, QueueTimeoutError } from "../analysis/analyzerQueue";
import { SessionStore } from "../sessions/sessionStore";
import { FileMaterialsProvider } from "../materials/materialsProvider";
import { END_OF_STREAM } from "@shared/schema";
import type { EventBus } from "../events/eventBus";
import type { AudioSource } from "../audio/audioSource";
import type { TranscriptionBackend } from "../stt/backend";
import type { AnalyzerBackend } from "../analysis/llmBackend";
import type { MaterialsProvider } from "../materials/materialsProvider";
import type { PipelineConfig } from "../config/pipeline";
import type { SessionPaths } from "../sessions/sessionStore";
import type { Session, SessionState } from "@shared/schema";

export type ControlAction = "start" | "pause" | "resume" | "end";

const TRANSITIONS: Record<ControlAction, { from: readonly SessionState[]; to: SessionState }> = {
  start: { from: ["Created"], to: "Active" },
  pause: { from: ["Active"], to: "Paused" },
  resume: { from: ["Paused"], to: "Active" },
  end: { from: ["Active", "Paused"], to: "Ended" },
};

const PUMP_STOP_TIMEOUT_MS = 2000;

export interface ClassroomEngineOptions {
  config: PipelineConfig;
  transcription: TranscriptionBackend;
  analyzer: AnalyzerBackend;
  audioSource: AudioSource;
  materials?: MaterialsProvider;
  bus?: EventBus;
}

export interface CreateSessionOptions {
  description?: string;
  materials?: string[];
}

export interface ClassroomEngineStatus {
  session: Session | null;
  directory: string | null;
  sourceEnded: boolean;
  framesRead: number;
  framesDiscarded: number;
  channel: ReturnType<TranscriptionChannel["getStats"]> | null;
  analysis: ReturnType<AnalysisEngine["getStats"]> | null;
  bus: ReturnType<EventBus["getStats"]>;
}

interface RunningSession {
  store: SessionStore;
  channel: TranscriptionChannel;
  analysis: AnalysisEngine;
  pump: Promise<void>;
}

export class ClassroomEngine {
  readonly bus: EventBus;

  private session: Session | null = null;
  private plannedState: SessionState | null = null;
  private running: RunningSession | null = null;
  private paths: SessionPaths | null = null;
  private controlChain: Promise<void> = Promise.resolve();

  private forwarding = false;
  private pumpStopped = false;
  private sourceEnded = false;
  private sourceEndWaiters: Array<() => void> = [];
  private framesRead = 0;
  private framesDiscarded = 0;

  constructor(private readonly options: ClassroomEngineOptions) {
    this.bus = options.bus ?? createEventBus();
  }

  createSession(name: string, options: CreateSessionOptions = {}): Session {
    if (this.session && this.session.state !== "Ended") {
      throw new InvalidStateTransitionError(this.session.state, "create a new session while holding");
    }

    const session: Session = {
      id: uuidv4(),
      name: name.trim() || "Untitled lecture",
      description: options.description ?? "",
      createdAt: new Date().toISOString(),
      materialsRefs: [...(options.materials ?? [])],
      state: "Created",
    };

    this.session = session;
    this.plannedState = "Created";
    this.paths = null;
    this.resetPumpState();
    publishLifecycle(this.bus, session.id, "created");
    log(`[ClassroomEngine] Session created: ${session.name} (${session.id})`, "engine");
    return { ...session };
  }

  getSession(): Session | null {
    return this.session ? { ...this.session, materialsRefs: [...this.session.materialsRefs] } : null;
  }

  get state(): SessionState | null {
    return this.session?.state ?? null;
  }

  start(): Promise<void> {
    return this.control("start", (session) => this.runStart(session));
  }

  pause(): Promise<void> {
    return this.control("pause", (session) => this.runPause(session));
  }

  resume(): Promise<void> {
    return this.control("resume", (session) => this.runResume(session));
  }

  end(): Promise<void> {
    return this.control("end", (session) => this.runEnd(session));
  }

  private control(action: ControlAction, run: (session: Session) => Promise<void>): Promise<void> {
    const session = this.session;
    const transition = TRANSITIONS[action];

    if (!session || this.plannedState === null) {
      throw new InvalidStateTransitionError("None", action);
    }
    if (!transition.from.includes(this.plannedState)) {
      throw new InvalidStateTransitionError(this.plannedState, action);
    }

    this.plannedState = transition.to;

    const task = this.controlChain.then(async () => {
      // An earlier action may have failed and left the session elsewhere
      if (!transition.from.includes(session.state)) {
        throw new InvalidStateTransitionError(session.state, action);
      }
      await run(session);
    });

    this.controlChain = task.catch((error) => {
      this.plannedState = session.state;
      log(`[ClassroomEngine] ${action} failed: ${errorMessage(error)}`, "engine", "error");
    });

    return task;
  }

  private async runStart(session: Session): Promise<void> {
    const { config } = this.options;
    const bus = this.bus;

    const store = new SessionStore(config.storage);
    this.paths = await store.open(session, {
      outputLanguage: config.analysis.outputLanguage,
      sourceLanguage: config.transcription.language,
      summaryIntervalMs: config.analysis.summaryIntervalMs,
    });
    store.attach(bus);

    const analysis = new AnalysisEngine({ bus, backend: this.options.analyzer, settings: config.analysis });
    await this.loadMaterials(session, store, analysis);

    const channel = new TranscriptionChannel({
      sessionId: session.id,
      bus,
      backend: this.options.transcription,
      audio: config.audio,
      settings: config.transcription,
    });

    try {
      await channel.open();
    } catch (error) {
      store.detach();
      await store.flush();
      log(`[ClassroomEngine] Start aborted, transcription unavailable: ${errorMessage(error)}`, "engine", "error");
      throw error;
    }

    analysis.start();

    this.resetPumpState();
    this.forwarding = true;
    const pump = this.runPump(channel);
    this.running = { store, channel, analysis, pump };

    session.state = "Active";
    await store.saveMeta(session);
    publishLifecycle(bus, session.id, "started");
    log(`[ClassroomEngine] Session ${session.id} started`, "engine");
  }

  private async loadMaterials(session: Session, store: SessionStore, analysis: AnalysisEngine): Promise<void> {
    if (session.materialsRefs.length === 0) return;

    for (const ref of session.materialsRefs) {
      try {
        await store.addMaterial(ref);
      } catch (error) {
        if (!(error instanceof PersistenceError)) throw error;
        log(`[ClassroomEngine] ${error.message}`, "engine", "warn");
        reportPipelineError(this.bus, "engine", error);
      }
    }

    const provider = this.options.materials ?? new FileMaterialsProvider();
    analysis.setMaterials(await provider.load(session.materialsRefs));
  }

  private resetPumpState(): void {
    this.forwarding = false;
    this.pumpStopped = false;
    this.sourceEnded = false;
    this.framesRead = 0;
    this.framesDiscarded = 0;
  }

  /** Reads frames until the source ends or the pump is stopped */
  private async runPump(channel: TranscriptionChannel): Promise<void> {
    const source = this.options.audioSource;

    try {
      while (!this.pumpStopped) {
        const frame = await source.nextFrame();
        if (frame === END_OF_STREAM) {
          log(`[ClassroomEngine] Audio source ended after ${this.framesRead} frame(s)`, "engine");
          break;
        }
        if (this.pumpStopped) break;

        this.framesRead++;
        if (!this.forwarding) {
          this.framesDiscarded++;
          continue;
        }

        this.bus.publish("audio.frame", frame);
        channel.sendAudio(frame);
      }
    } catch (error) {
      if (this.pumpStopped) {
        log(`[ClassroomEngine] Audio source closed: ${errorMessage(error)}`, "engine", "debug");
      } else if (error instanceof ChannelClosedError) {
        log(`[ClassroomEngine] Transcription channel refused audio, pump stopped`, "engine", "warn");
        reportPipelineError(this.bus, "engine", error);
      } else {
        log(`[ClassroomEngine] Audio source failed: ${errorMessage(error)}`, "engine", "error");
        if (isPipelineError(error)) {
          reportPipelineError(this.bus, "engine", error);
        }
      }
    } finally {
      this.sourceEnded = true;
      const waiters = this.sourceEndWaiters;
      this.sourceEndWaiters = [];
      waiters.forEach(resolve => resolve());
    }
  }

  /** Resolves once the audio source is exhausted or the pump has stopped */
  whenSourceEnds(): Promise<void> {
    if (this.sourceEnded) return Promise.resolve();
    return new Promise(resolve => {
      this.sourceEndWaiters.push(resolve);
    });
  }

  private async stopPump(running: RunningSession): Promise<void> {
    this.pumpStopped = true;
    this.forwarding = false;
    await this.options.audioSource.close();

    try {
      await withTimeout(running.pump, PUMP_STOP_TIMEOUT_MS, "audio pump");
    } catch (error) {
      if (!(error instanceof QueueTimeoutError)) throw error;
      log(`[ClassroomEngine] Audio source did not stop within ${PUMP_STOP_TIMEOUT_MS}ms`, "engine", "warn");
    }
  }

  private requireRunning(): RunningSession {
    if (!this.running) {
      throw new InvalidStateTransitionError(this.session?.state ?? "None", "control");
    }
    return this.running;
  }

  private async runPause(session: Session): Promise<void> {
    const { analysis, store } = this.requireRunning();

    this.forwarding = false;
    analysis.pause();

    session.state = "Paused";
    await store.saveMeta(session);
    publishLifecycle(this.bus, session.id, "paused");
    log(`[ClassroomEngine] Session ${session.id} paused`, "engine");
  }

  private async runResume(session: Session): Promise<void> {
    const { analysis, store } = this.requireRunning();

    analysis.resume();
    this.forwarding = true;

    session.state = "Active";
    await store.saveMeta(session);
    publishLifecycle(this.bus, session.id, "resumed");
    log(`[ClassroomEngine] Session ${session.id} resumed`, "engine");
  }

  private async runEnd(session: Session): Promise<void> {
    const running = this.requireRunning();
    const { channel, analysis, store } = running;
    log(`[ClassroomEngine] Ending session ${session.id}...`, "engine");

    await this.stopPump(running);
    await channel.close();
    await this.bus.idle();

    await analysis.stop();
    await this.bus.idle();

    session.state = "Ended";
    session.endedAt = new Date().toISOString();
    await store.finalize(session);
    this.running = null;

    publishLifecycle(this.bus, session.id, "ended");
    log(`[ClassroomEngine] Session ${session.id} ended (${this.framesRead} frames read, ${this.framesDiscarded} discarded)`, "engine");
  }

  private requireAnalysis(action: string): AnalysisEngine {
    const state = this.session?.state ?? "None";
    if (!this.running || (state !== "Active" && state !== "Paused")) {
      throw new InvalidStateTransitionError(state, action);
    }
    return this.running.analysis;
  }

  requestSummary(): boolean {
    return this.requireAnalysis("request a summary for").requestSummary();
  }

  requestSuggestion(): boolean {
    return this.requireAnalysis("request a suggestion for").requestSuggestion();
  }

  requestIdeas(): boolean {
    return this.requireAnalysis("request ideas for").requestIdeas();
  }

  regenerateAnswer(questionEventId: string): boolean {
    return this.requireAnalysis("regenerate an answer in").regenerateAnswer(questionEventId);
  }

  /** Directory layout of the current session; kept after it ends */
  get sessionPaths(): SessionPaths | null {
    return this.paths;
  }

  getStatus(): ClassroomEngineStatus {
    return {
      session: this.getSession(),
      directory: this.paths?.root ?? null,
      sourceEnded: this.sourceEnded,
      framesRead: this.framesRead,
      framesDiscarded: this.framesDiscarded,
      channel: this.running?.channel.getStats() ?? null,
      analysis: this.running?.analysis.getStats() ?? null,
      bus: this.bus.getStats(),
    };
  }
}
