/**
 * Operator Console
 *
 * One utterance in, one reply out. Shared by the chat channel and the web
 * chat: slash commands and calendar-link requests are answered directly,
 * everything else runs interpreter → coordinator.
 */

import type {
  AudioInput,
  Clock,
  Intent,
  OperationResult,
  OperationCoordinator,
  CommandInterpreter,
  StoreSnapshot,
} from "@cabin-calendar/core";
import {
  createLogger,
  errorMessage,
  isMutation,
  systemClock,
  upcomingReservations,
} from "@cabin-calendar/core";
import { formatReject, formatReservationList, formatResult } from "./replies.js";

const log = createLogger("operator");

/** Words that mean "send me the calendar link" */
const CALENDAR_KEYWORDS = ["calendar", "link", "web", "page", "see reservations"];

export interface OperatorMessage {
  text: string;
  audio?: AudioInput;
  /** For logs only */
  sender?: string;
}

export interface ConsoleReply {
  text: string;
  /** What was heard, for voice messages */
  transcript?: string;
  intent?: Intent;
  result?: OperationResult;
}

export interface OperatorConsoleDeps {
  interpreter: Pick<CommandInterpreter, "interpret" | "interpretVoice">;
  coordinator: Pick<OperationCoordinator, "list" | "apply">;
  calendarUrl?: string;
  calendarName?: string;
  clock?: Clock;
}

function mentionsCalendar(text: string): boolean {
  const lower = text.toLowerCase();
  return CALENDAR_KEYWORDS.some((keyword) => new RegExp(`\\b${keyword}\\b`).test(lower));
}

export class OperatorConsole {
  private readonly deps: OperatorConsoleDeps;
  private readonly clock: Clock;

  constructor(deps: OperatorConsoleDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? systemClock;
  }

  welcomeText(): string {
    return [
      `Hi! I keep the ${this.deps.calendarName ?? "cabin"} reservations.`,
      "",
      "Write or say what you need:",
      "- book a new stay",
      "- change or cancel a reservation",
      "- ask about upcoming bookings",
      "",
      "/calendar sends the link to the public calendar.",
    ].join("\n");
  }

  calendarText(): string {
    return this.deps.calendarUrl
      ? `Reservations calendar:\n${this.deps.calendarUrl}`
      : "The public calendar link is not configured yet.";
  }

  /** Every path returns a reply; failures are reported, never thrown */
  async handle(message: OperatorMessage): Promise<ConsoleReply> {
    try {
      return await this.dispatch(message);
    } catch (err) {
      log.error({ err: errorMessage(err), sender: message.sender }, "Message handling failed");
      return { text: `Sorry, something went wrong while handling your message: ${errorMessage(err)}` };
    }
  }

  private async dispatch(message: OperatorMessage): Promise<ConsoleReply> {
    const text = message.text.trim();

    if (!message.audio) {
      const command = text.split(/\s+/)[0].toLowerCase().replace(/@.*$/, "");
      if (command === "/start" || command === "/help") return { text: this.welcomeText() };
      if (command === "/calendar" || mentionsCalendar(text)) {
        log.info({ sender: message.sender }, "Calendar link requested");
        return { text: this.calendarText() };
      }
    }

    const snapshot = await this.deps.coordinator.list();

    if (message.audio) {
      const voice = await this.deps.interpreter.interpretVoice(message.audio, snapshot);
      const reply = await this.execute(voice.intent, snapshot);
      if (voice.transcript === null) return reply;
      return { ...reply, transcript: voice.transcript, text: `Heard: "${voice.transcript}"\n\n${reply.text}` };
    }

    const intent = await this.deps.interpreter.interpret(text, snapshot);
    return this.execute(intent, snapshot);
  }

  private async execute(intent: Intent, snapshot: StoreSnapshot): Promise<ConsoleReply> {
    log.info({ kind: intent.kind }, "Intent");

    if (isMutation(intent)) {
      const result = await this.deps.coordinator.apply(intent);
      return { text: formatResult(result), intent, result };
    }

    if (intent.kind === "query") {
      const text = intent.answer
        ? intent.answer
        : formatReservationList(upcomingReservations(snapshot, this.clock()), "Upcoming reservations:");
      return { text, intent };
    }

    return { text: formatReject(intent), intent };
  }
}
