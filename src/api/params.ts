/**
 * Zod schemas for HTTP query parameters
 *
 * Out-of-range values are rejected with a message meant for the caller.
 * Only `limit` and `radiusKm` above their ceilings are corrected, by clamping.
 * A blank value (`?limit=`) counts as absent: optional parameters take their
 * default, required ones are rejected.
 */

import { z } from 'zod';

export const PIN_LIST_MAX_LIMIT = 200;
export const SEARCH_MAX_LIMIT = 100;
export const NEAR_MAX_LIMIT = 100;
export const MAX_RADIUS_KM = 500;

/** Extra results requested from the engine so offsets past the first page still fill */
export const SEARCH_LOOKAHEAD = 50;

function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim().length === 0 ? undefined : value;
}

// z.coerce.number would read '' as 0
function numberParam<S extends z.ZodTypeAny>(schema: S) {
  return z.preprocess(blankToUndefined, schema);
}

function limitParam(defaultLimit: number, maxLimit: number) {
  return numberParam(
    z.coerce
      .number({ invalid_type_error: 'limit must be a number' })
      .int('limit must be an integer')
      .min(1, 'limit must be ≥ 1')
      .default(defaultLimit)
      .transform((limit) => Math.min(limit, maxLimit)),
  );
}

const offsetParam = numberParam(
  z.coerce
    .number({ invalid_type_error: 'offset must be a number' })
    .int('offset must be an integer')
    .min(0, 'offset must be ≥ 0')
    .default(0),
);

const withLinksParam = z.preprocess(
  blankToUndefined,
  z
    .enum(['true', 'false'], { errorMap: () => ({ message: 'withLinks must be true or false' }) })
    .default('false')
    .transform((value) => value === 'true'),
);

export const ListPinsParamsSchema = z.object({
  /** Blank means every list */
  list: z.preprocess(blankToUndefined, z.string().trim().optional()),
  limit: limitParam(50, PIN_LIST_MAX_LIMIT),
  offset: offsetParam,
  withLinks: withLinksParam,
});

export const SearchParamsSchema = z.object({
  q: z.string({ required_error: 'query required' }).trim().min(1, 'query required'),
  limit: limitParam(30, SEARCH_MAX_LIMIT),
  offset: offsetParam,
  withLinks: withLinksParam,
});

export const NearParamsSchema = z.object({
  lat: numberParam(
    z.coerce
      .number({ invalid_type_error: 'latitude must be a number' })
      .min(-90, 'latitude must be -90 to 90')
      .max(90, 'latitude must be -90 to 90'),
  ),
  lng: numberParam(
    z.coerce
      .number({ invalid_type_error: 'longitude must be a number' })
      .min(-180, 'longitude must be -180 to 180')
      .max(180, 'longitude must be -180 to 180'),
  ),
  radiusKm: numberParam(
    z.coerce
      .number({ invalid_type_error: 'radius must be a number' })
      .positive('radius must be > 0')
      .default(10)
      .transform((radius) => Math.min(radius, MAX_RADIUS_KM)),
  ),
  limit: limitParam(30, NEAR_MAX_LIMIT),
  offset: offsetParam,
  withLinks: withLinksParam,
});

export const DetailsParamsSchema = z.object({
  name: z.string({ required_error: 'place name required' }).trim().min(1, 'place name required'),
});

export type ParamsResult<T> =
  | { ok: true; data: T }
  | { ok: false; error: string };

export function parseParams<S extends z.ZodTypeAny>(schema: S, input: unknown): ParamsResult<z.output<S>> {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    const data: z.output<S> = parsed.data;
    return { ok: true, data };
  }
  return { ok: false, error: parsed.error.issues[0]?.message ?? 'Invalid parameters' };
}

export interface Page<T> {
  items: T[];
  total: number;
  /** Set when the page is empty, explaining why */
  message?: string;
}

export function paginate<T>(items: readonly T[], limit: number, offset: number): Page<T> {
  const total = items.length;
  const page = items.slice(offset, offset + limit);

  if (page.length > 0) {
    return { items: page, total };
  }
  if (total === 0) {
    return { items: [], total, message: 'No results' };
  }
  return { items: [], total, message: `Offset ${offset} exceeds ${total} total results` };
}
