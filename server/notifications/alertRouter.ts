/**
 * Alert routing
 *
 * Formats analysis output and pipeline health events into alerts and hands
 * them to a notification sink. Runs as ordinary bus subscribers, so a slow
 * or failing sink never holds up transcription or analysis.
 */

import { log, errorMessage } from "../logger";
import { formatTimestamp } from "../sessions/sessionStore";
import type { EventBus, SubscriptionHandle } from "../events/eventBus";
import type {
  AnswerEvent,
  IdeaEvent,
  LifecycleEvent,
  PipelineErrorEvent,
  QuestionEvent,
  SuggestionEvent,
  SummaryEvent,
} from "@shared/schema";

export type AlertLevel = "info" | "warning" | "error" | "question" | "answer" | "summary" | "suggestion" | "idea";

export interface Alert {
  level: AlertLevel;
  title: string;
  body: string;
}

export interface NotificationSink {
  readonly name: string;
  send(alert: Alert): Promise<void>;
}

const ICONS: Record<AlertLevel, string> = {
  info: "i",
  warning: "!",
  error: "x",
  question: "?",
  answer: ">",
  summary: "#",
  suggestion: "*",
  idea: "+",
};

export function formatAlert(alert: Alert): string {
  return `\n[${ICONS[alert.level]}] ${alert.title}\n${alert.body}\n`;
}

export class ConsoleNotificationSink implements NotificationSink {
  readonly name = "console";

  constructor(private readonly write: (text: string) => void = (text) => process.stdout.write(text)) {}

  async send(alert: Alert): Promise<void> {
    this.write(formatAlert(alert));
  }
}

export function questionAlert(question: QuestionEvent): Alert {
  return {
    level: "question",
    title: `Question (${question.kind}, ${Math.round(question.confidence * 100)}%)`,
    body: question.questionText,
  };
}

export function answerAlert(answer: AnswerEvent, questionText?: string): Alert {
  const title = answer.supersedes ? "Answer (regenerated)" : answer.fallback ? "Answer (unavailable)" : "Answer";
  const body = questionText ? `Q: ${questionText}\nA: ${answer.answerText}` : answer.answerText;
  return { level: "answer", title, body };
}

export function summaryAlert(summary: SummaryEvent): Alert {
  const range = `${formatTimestamp(summary.windowStart)}-${formatTimestamp(summary.windowEnd)}`;
  const points = summary.keyPoints.map(point => `  - ${point}`).join("\n");
  return {
    level: "summary",
    title: `Summary ${range}${summary.title ? `: ${summary.title}` : ""}`,
    body: points ? `${summary.text}\n${points}` : summary.text,
  };
}

export function suggestionAlert(suggestion: SuggestionEvent): Alert {
  const lines = [suggestion.question];
  if (suggestion.rationale) lines.push(`Why: ${suggestion.rationale}`);
  if (suggestion.timing) lines.push(`When: ${suggestion.timing}`);
  return { level: "suggestion", title: "Suggested question", body: lines.join("\n") };
}

export function ideaAlert(idea: IdeaEvent): Alert {
  const lines = [
    ...idea.ideas.map(item => `  - ${item.idea}${item.detail ? `: ${item.detail}` : ""}`),
    ...idea.deepLearning.map(item => `  > ${item.topic}${item.reason ? `: ${item.reason}` : ""}`),
    ...idea.crossDiscipline.map(item => `  ~ ${item.field}${item.connection ? `: ${item.connection}` : ""}`),
  ];
  return { level: "idea", title: "Ideas", body: lines.join("\n") };
}

export function lifecycleAlert(event: LifecycleEvent): Alert | null {
  switch (event.type) {
    case "degraded":
      return { level: "error", title: "Transcription degraded", body: event.reason ?? "" };
    case "recovered":
      return { level: "info", title: "Transcription recovered", body: event.reason ?? "" };
    case "warning":
      return { level: "warning", title: "Warning", body: event.reason ?? "" };
    default:
      return null;
  }
}

export function pipelineErrorAlert(event: PipelineErrorEvent): Alert {
  return { level: "warning", title: `${event.kind} in ${event.component}`, body: event.message };
}

export class AlertRouter {
  private subscriptions: SubscriptionHandle[] = [];
  private readonly questionTexts = new Map<string, string>();
  private sent = 0;
  private failed = 0;

  constructor(
    private readonly bus: EventBus,
    private readonly sink: NotificationSink,
    private readonly options: { includeErrors: boolean } = { includeErrors: true }
  ) {}

  start(): void {
    const { bus } = this;
    this.subscriptions.push(
      bus.subscribe("question.detected", (question) => {
        this.questionTexts.set(question.id, question.questionText);
        return this.deliver(questionAlert(question));
      }, "alerts.questions"),
      bus.subscribe("answer.generated", (answer) => this.deliver(answerAlert(answer, this.questionTexts.get(answer.questionEventId))), "alerts.answers"),
      bus.subscribe("summary.generated", (summary) => this.deliver(summaryAlert(summary)), "alerts.summaries"),
      bus.subscribe("suggestion.generated", (suggestion) => this.deliver(suggestionAlert(suggestion)), "alerts.suggestions"),
      bus.subscribe("idea.generated", (idea) => this.deliver(ideaAlert(idea)), "alerts.ideas"),
      bus.subscribe("session.lifecycle", (event) => {
        const alert = lifecycleAlert(event);
        return alert ? this.deliver(alert) : undefined;
      }, "alerts.lifecycle")
    );

    if (this.options.includeErrors) {
      this.subscriptions.push(
        bus.subscribe("pipeline.error", (event) => this.deliver(pipelineErrorAlert(event)), "alerts.errors")
      );
    }

    log(`[AlertRouter] Routing alerts to ${this.sink.name}`, "alerts");
  }

  stop(): void {
    for (const handle of this.subscriptions) {
      this.bus.unsubscribe(handle);
    }
    this.subscriptions = [];
  }

  private async deliver(alert: Alert): Promise<void> {
    try {
      await this.sink.send(alert);
      this.sent++;
    } catch (error) {
      this.failed++;
      log(`[AlertRouter] ${this.sink.name} failed to deliver "${alert.title}": ${errorMessage(error)}`, "alerts", "warn");
    }
  }

  getStats() {
    return { sent: this.sent, failed: this.failed };
  }
}
