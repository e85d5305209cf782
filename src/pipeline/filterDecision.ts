/**
 * Interpretation of the filter-stage model reply.
 * Structured replies are read as { worth, reason }; anything else falls back to
 * a keyword heuristic and never raises.
 */

import { z } from 'zod';

const filterReplySchema = z.object({
  worth: z.boolean().nullish().transform(value => value ?? false),
  reason: z.string().nullish().transform(value => value ?? '')
});

export interface FilterDecision {
  worth: boolean;
  reason: string;
  // False when the heuristic decided
  structured: boolean;
}

const CODE_FENCE = /^```[a-z]*\s*([\s\S]*?)\s*```$/i;

function stripCodeFence(reply: string): string {
  const trimmed = reply.trim();
  const match = CODE_FENCE.exec(trimmed);
  return match?.[1] ?? trimmed;
}

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

export function decideFromReply(reply: string, rejectMarker: string): FilterDecision {
  const json = tryParseJson(stripCodeFence(reply));
  if (json.ok) {
    const parsed = filterReplySchema.safeParse(json.value);
    if (parsed.success) {
      return { ...parsed.data, structured: true };
    }
  }

  const lower = reply.toLowerCase();
  const marker = rejectMarker.trim().toLowerCase();
  const rejected = (marker !== '' && lower.includes(marker)) || lower.includes('no');
  return { worth: !rejected, reason: '', structured: false };
}
