import type { FastifyReply } from "fastify";
import type { BookingErrorKind, OperationResult } from "@cabin-calendar/core";
import { errorMessage, isBookingError } from "@cabin-calendar/core";

const STATUS_BY_KIND: Record<BookingErrorKind, number> = {
  StoreCorrupt: 500,
  DuplicateGuest: 409,
  NotFound: 404,
  CabinConflict: 409,
  InvalidReservation: 422,
  TranscriptionFailed: 422,
  InterpretAmbiguous: 422,
  RenderInvariant: 500,
  PublishUnconfigured: 503,
  PublishFailed: 503,
  Timeout: 504,
};

export function httpStatusFor(err: unknown): number {
  return isBookingError(err) ? STATUS_BY_KIND[err.kind] : 500;
}

/** JSON body for a failed request */
export function errorBody(err: unknown): { error: string; kind?: BookingErrorKind; details?: Record<string, unknown> } {
  if (!isBookingError(err)) return { error: errorMessage(err) };
  return err.details
    ? { error: err.message, kind: err.kind, details: err.details }
    : { error: err.message, kind: err.kind };
}

/** Send a coordinator result: the record and publication on success, the error otherwise */
export function sendResult(reply: FastifyReply, result: OperationResult, successCode = 200): FastifyReply {
  if (!result.storeOk) {
    const err = result.error ?? new Error("Operation failed");
    return reply.code(httpStatusFor(err)).send(errorBody(err));
  }
  return reply.code(successCode).send({
    reservation: result.reservation ?? null,
    previous: result.previous ?? null,
    publication: result.publication,
    warnings: result.warnings,
  });
}
