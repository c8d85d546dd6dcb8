/** Who submitted a workload, as recorded in annotations. Absence is normal, not an error. */
export interface OwnerIdentity {
  user: string | null;
  team: string | null;
}

/** Annotation keys consulted in order; the first non-empty value wins. */
export interface OwnerAnnotationKeys {
  user: readonly string[];
  team: readonly string[];
}

function firstValue(annotations: Record<string, string>, keys: readonly string[]): string | null {
  for (const key of keys) {
    const value = annotations[key]?.trim();
    if (value) return value;
  }
  return null;
}

export function readOwner(annotations: Record<string, string> | undefined, keys: OwnerAnnotationKeys): OwnerIdentity {
  if (!annotations) return { user: null, team: null };
  return { user: firstValue(annotations, keys.user), team: firstValue(annotations, keys.team) };
}
