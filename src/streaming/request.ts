import { z } from "zod";
import { InvalidRequestError } from "./errors.js";
import type { Streaming } from "../types/streaming.js";

export type StreamRequest = Streaming.Session.Request;

/** Longest delay a Node timer honours; larger values fire after 1ms. */
export const MAX_DELAY_MS = 2_147_483_647;

export const streamParamsSchema = z.object({
  count: z.number().int().nonnegative(),
  delayMs: z.number().finite().nonnegative().max(MAX_DELAY_MS)
});

export type StreamParams = z.infer<typeof streamParamsSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validates count/delay and returns a frozen copy of the request.
 * Throws InvalidRequestError listing every failing field.
 */
export function parseStreamRequest(input: StreamRequest): Readonly<StreamRequest> {
  const parsed = streamParamsSchema.safeParse({ count: input.count, delayMs: input.delayMs });
  if (!parsed.success) {
    throw new InvalidRequestError(formatIssues(parsed.error));
  }
  return Object.freeze({ ...parsed.data, signal: input.signal });
}

/** Same checks for untyped adapter input (positional hub arguments, CLI flags). */
export function parseStreamParams(input: unknown): StreamParams {
  const parsed = streamParamsSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidRequestError(formatIssues(parsed.error));
  }
  return parsed.data;
}
