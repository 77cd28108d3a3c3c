import { z } from 'zod';
import { Position } from '../domain/Position';
import type { Move } from '../domain/Move';

const movePayload = z.object({
  row: z.number().int().min(0),
  column: z.number().int().min(0),
  value: z.number().int(),
});

const nameOf = z.object({ name: z.string() });

/** Socket `move`/`check` payload → Move, or null when the shape is wrong. */
export function parseMove(payload: unknown): Move | null {
  const r = movePayload.safeParse(payload);
  if (!r.success) return null;
  return { position: new Position(r.data.row, r.data.column), value: r.data.value };
}

/** Trimmed, at most 24 chars; null when empty. */
export function parseName(payload: unknown): string | null {
  const r = nameOf.safeParse(payload);
  if (!r.success) return null;
  const n = r.data.name.trim();
  return n ? n.slice(0, 24) : null;
}
