export interface ResolveNameKeyOptions {
  /** Called after an existing key has been renamed to a more specific name. */
  readonly onRename?: (from: string, to: string) => void;
}

interface NameParts {
  readonly first: string;
  readonly middle: readonly string[];
  readonly last: string;
}

function splitName(name: string): NameParts | undefined {
  const parts = name.split(/\s+/).filter((p) => p.length > 0);
  if (parts.length === 0) {
    return undefined;
  }
  return {
    first: parts[0],
    middle: parts.slice(1, -1),
    last: parts[parts.length - 1],
  };
}

function stripPeriod(part: string): string {
  return part.endsWith('.') ? part.slice(0, -1) : part;
}

/** True if the middle name or initial corresponds to any entry of `others`. */
function hasCorrespondence(part: string, others: readonly string[]): boolean {
  const n = stripPeriod(part);
  return others.some((other) => {
    const m = stripPeriod(other);
    return n === m || n.startsWith(m) || m.startsWith(n);
  });
}

/**
 * More middle names is more specific; with equally many, spelled-out names
 * beat initials (`Bergþóruson` over `B.`).
 */
function isMoreSpecific(middle: readonly string[], than: readonly string[]): boolean {
  if (middle.length !== than.length) {
    return middle.length > than.length;
  }
  const letters = (parts: readonly string[]): number =>
    parts.reduce((sum, part) => sum + [...stripPeriod(part)].length, 0);
  return letters(middle) > letters(than);
}

function rename<V>(registry: Map<string, V>, from: string, to: string, options: ResolveNameKeyOptions): string {
  const value = registry.get(from);
  if (value !== undefined) {
    registry.set(to, value);
  }
  registry.delete(from);
  options.onRename?.(from, to);
  return to;
}

/**
 * Returns the registry key under which data about the person `name` should
 * be stored. This is an existing key when the registry already holds the
 * same person under another spelling, or `name` itself. When `name` is the
 * more specific spelling the existing entry is moved to it first.
 *
 * These spellings all resolve to one key:
 * `Dagur Bergþóruson Eggertsson`, `Dagur B. Eggertsson`, `Dagur B Eggertsson`,
 * `Dagur Eggertsson`.
 *
 * Returns `undefined` for a blank name.
 */
export function resolveNameKey<V>(
  registry: Map<string, V>,
  name: string,
  options: ResolveNameKeyOptions = {},
): string | undefined {
  if (registry.has(name)) {
    return name;
  }

  const candidate = splitName(name);
  if (!candidate) {
    return undefined;
  }

  for (const key of [...registry.keys()]) {
    const existing = splitName(key);
    if (!existing || existing.first !== candidate.first || existing.last !== candidate.last) {
      continue;
    }

    if (candidate.middle.length === 0) {
      return key;
    }

    if (existing.middle.length === 0) {
      return rename(registry, key, name, options);
    }

    const candidateCorresponds = candidate.middle.every((m) => hasCorrespondence(m, existing.middle));
    const existingCorresponds = existing.middle.every((m) => hasCorrespondence(m, candidate.middle));
    if (candidateCorresponds || existingCorresponds) {
      if (isMoreSpecific(candidate.middle, existing.middle)) {
        return rename(registry, key, name, options);
      }
      return key;
    }

    // Middle names disagree: a different person with the same first and last name
  }

  return name;
}
