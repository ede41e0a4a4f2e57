/**
 * Lecture Pilot entry point
 *
 * Usage:
 *   arecord -f S16_LE -r 16000 -c 1 -t raw | tsx server/index.ts "Lecture name" [materials...]
 *   tsx server/index.ts sessions
 *
 * Reads PCM16LE from stdin, transcribes it with the configured streaming
 * backend, prints alerts to the console and ends the session on SIGINT or
 * when stdin closes.
 */

import { log, errorMessage, setLogLevel } from "./logger";
import { getEnv, requireEnv } from "./src/config/env";
import { pipelineConfigFromEnv } from "./config/pipeline";
import { ReadableAudioSource } from "./audio/audioSource";
import { createTranscriptionBackend } from "./stt";
import { createAnalyzerBackend } from "./analysis";
import { ClassroomEngine } from "./engine/classroomEngine";
import { AlertRouter, ConsoleNotificationSink } from "./notifications/alertRouter";
import { SessionStore, describeSession } from "./sessions/sessionStore";
import { isPipelineError } from "./errors";

async function listSessions(dataDir: string): Promise<void> {
  const sessions = await SessionStore.listSessions(dataDir);
  if (sessions.length === 0) {
    console.log(`No sessions under ${dataDir}`);
    return;
  }
  for (const meta of sessions) {
    console.log(describeSession(meta));
  }
}

async function main(): Promise<void> {
  const env = getEnv();
  setLogLevel(env.LOG_LEVEL);
  const config = pipelineConfigFromEnv(env);

  const args = process.argv.slice(2);
  if (args[0] === "sessions") {
    await listSessions(config.storage.dataDir);
    return;
  }

  requireEnv("DEEPGRAM_API_KEY", env);
  const [name = "Lecture", ...materials] = args;

  const engine = new ClassroomEngine({
    config,
    transcription: createTranscriptionBackend(config.transcription, config.audio),
    analyzer: createAnalyzerBackend(config.llm),
    audioSource: new ReadableAudioSource(process.stdin, config.audio),
  });

  const alerts = new AlertRouter(engine.bus, new ConsoleNotificationSink());
  alerts.start();

  engine.createSession(name, { materials });
  await engine.start();
  log(`Session started, writing to ${engine.sessionPaths?.root ?? "(unknown)"}`, "engine");

  const interrupted = new Promise<string>(resolve => {
    process.once("SIGINT", () => resolve("SIGINT"));
    process.once("SIGTERM", () => resolve("SIGTERM"));
  });
  const sourceEnded = engine.whenSourceEnds().then(() => "end of audio");

  const reason = await Promise.race([interrupted, sourceEnded]);
  log(`Ending session (${reason})...`, "engine");

  await engine.end();
  await engine.bus.idle();
  alerts.stop();

  const status = engine.getStatus();
  log(`Session saved to ${status.directory ?? "(unknown)"}`, "engine");
}

main()
  .then(() => {
    process.exit(0);
  })
  .catch((error) => {
    const prefix = isPipelineError(error) ? error.kind : "Fatal";
    log(`${prefix}: ${errorMessage(error)}`, "engine", "error");
    process.exit(1);
  });
