/** Maps each canonical request field to the body keys accepted for it, in priority order. */
export type FieldAliases = Readonly<Record<string, readonly string[]>>;

export const BULK_FIELD_ALIASES = {
  participants: ['participants', 'participant', 'names', 'noms', 'numeros'],
  gifts: ['gifts', 'gift', 'cadeaux', 'numeros'],
  men: ['men', 'hommes'],
  women: ['women', 'femmes'],
} as const satisfies FieldAliases;

export const SINGLE_FIELD_ALIASES = {
  participant: ['participant', 'name', 'numero'],
  gift: ['gift', 'cadeau', 'numero'],
} as const satisfies FieldAliases;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Picks, for every canonical field, the value of the first alias present in
 * the body. Keys that are not aliases of a requested field are dropped.
 */
export function resolveAliasedFields<K extends string>(
  body: unknown,
  aliases: Readonly<Record<K, readonly string[]>>,
  fields: readonly K[],
): Partial<Record<K, unknown>> {
  const resolved: Partial<Record<K, unknown>> = {};
  if (!isRecord(body)) return resolved;

  for (const field of fields) {
    const key = aliases[field].find((alias) => body[alias] !== undefined);
    if (key !== undefined) resolved[field] = body[key];
  }
  return resolved;
}
