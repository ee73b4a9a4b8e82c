/**
 * Operator-facing reply text for every interpreter and coordinator outcome.
 */

import type {
  OperationResult,
  RejectIntent,
  Reservation,
} from "@cabin-calendar/core";
import { addNights, errorMessage, isBookingError } from "@cabin-calendar/core";

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? "" : "s"}`;
}

/** One-line summary of a reservation */
export function describeReservation(r: Reservation): string {
  const parts = [
    `${r.guestName} in ${r.cabin}`,
    `${r.checkInDate} to ${addNights(r.checkInDate, r.totalNights)} (${plural(r.totalNights, "night")})`,
    `total ${r.totalPrice}, deposit ${r.deposit}`,
  ];
  if (r.phone) parts.push(`phone ${r.phone}`);
  if (r.notes) parts.push(r.notes);
  return parts.join(", ");
}

export function formatReservationList(list: readonly Reservation[], title: string): string {
  if (list.length === 0) return "There are no upcoming reservations.";
  return [title, ...list.map((r) => `- ${describeReservation(r)}`)].join("\n");
}

export function formatReject(intent: RejectIntent): string {
  const detail = intent.detail ? ` (${intent.detail})` : "";
  switch (intent.reason) {
    case "transcription_failed":
      return `I could not understand the voice message${detail}. Please try again or send it as text.`;
    case "unknown_guest": {
      const head = intent.detail ?? "No reservation found for that guest";
      const candidates = intent.candidates ?? [];
      return candidates.length > 0
        ? `${head}. Did you mean: ${candidates.join(", ")}?`
        : `${head}.`;
    }
    case "missing_fields":
      return `I need more details: ${intent.detail ?? "some fields are missing"}.`;
    case "malformed_reply":
      return "I could not interpret that request. Nothing was changed; please rephrase it.";
    case "model_unavailable":
      return `The assistant is unavailable right now${detail}. Nothing was changed; please try again later.`;
    case "unsupported":
      return `I can only create, modify, cancel or look up reservations${detail}.`;
  }
}

function formatFailure(err: Error): string {
  if (isBookingError(err)) {
    switch (err.kind) {
      case "Timeout":
        return "Another change is still being saved. Nothing was saved; please send the request again.";
      case "StoreCorrupt":
        return `The reservations file could not be read: ${err.message}. Nothing was changed.`;
      case "DuplicateGuest":
      case "NotFound":
      case "CabinConflict":
      case "InvalidReservation":
        return `Not saved: ${err.message}.`;
      default:
        return `Not saved: ${err.message}`;
    }
  }
  return `Something went wrong while saving: ${errorMessage(err)}`;
}

/** Reply for a finished create, modify, delete or sync */
export function formatResult(result: OperationResult): string {
  if (!result.storeOk) {
    return formatFailure(result.error ?? new Error("unknown failure"));
  }

  const lines: string[] = [];
  const r = result.reservation;
  switch (result.operation) {
    case "create":
      lines.push(r ? `Booked ${describeReservation(r)}.` : "Booked.");
      break;
    case "modify":
      lines.push(r ? `Updated ${describeReservation(r)}.` : "Updated.");
      break;
    case "delete":
      lines.push(r ? `Cancelled the reservation for ${r.guestName} (${r.cabin}, ${r.checkInDate}).` : "Cancelled.");
      break;
    case "sync":
    case "import":
      lines.push("Calendar refreshed from the current reservations.");
      break;
  }

  const state = result.publication?.state;
  if (state === "published") lines.push("The public calendar is updated.");
  else if (state === "no_change") lines.push("The public calendar was already up to date.");
  lines.push(...result.warnings);
  return lines.join("\n");
}
