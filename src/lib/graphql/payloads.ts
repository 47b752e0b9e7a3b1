import { MUTATIONS, type MutationName } from "./mutations";

export type GraphqlEnvelope = {
  query: string;
  variables: Record<string, unknown>;
};

export const FALLBACK_FILE_TOKEN = "unnamed";

export function buildEnvelope(
  mutation: MutationName,
  variables: Record<string, unknown>
): GraphqlEnvelope {
  return { query: MUTATIONS[mutation], variables };
}

/**
 * File-system safe form of an entity name: letters, digits, space, `_` and `-`
 * survive, then spaces become underscores.
 */
export function sanitizeFileName(name: string): string {
  const kept = name.replace(/[^\p{L}\p{N} _-]/gu, "").trim();
  return (kept || FALLBACK_FILE_TOKEN).replace(/ /g, "_");
}

export function itemFileName(prefix: string, key: string): string {
  return `${prefix}_${sanitizeFileName(key)}.json`;
}
