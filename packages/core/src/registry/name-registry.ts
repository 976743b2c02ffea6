import { createChildLogger } from '@spurn/shared/src/logger.js';
import type { QueryToken } from '@spurn/shared/src/types/query.types.js';
import type { NameRegistry, NameRegistryEntry } from '@spurn/shared/src/types/registry.types.js';
import { resolveNameKey } from '../answers/name-canonicalizer.js';
import type { DescriptionLookup } from './description-lookup.js';

const log = createChildLogger('registry:builder');

export interface BuildNameRegistryOptions {
  /** Also register names for which no title or definition is known. */
  readonly allNames?: boolean;
}

/** The multi-part key whose last part is `last`, e.g. `Hillary Rodham Clinton` for `Clinton`. */
function findFullName(registry: NameRegistry, last: string): string | undefined {
  for (const key of registry.keys()) {
    const parts = key.split(/\s+/);
    if (parts.length > 1 && parts[parts.length - 1] === last) {
      return key;
    }
  }
  return undefined;
}

/** Points refs at `from` to `to`, so that no ref is left dangling after a rename. */
function retargetRefs(registry: NameRegistry, from: string, to: string): void {
  for (const [key, entry] of registry) {
    if (entry.kind === 'ref' && entry.fullname === from) {
      registry.set(key, { kind: 'ref', fullname: to });
    }
  }
}

async function addName(
  registry: NameRegistry,
  name: string,
  lookup: DescriptionLookup,
  allNames: boolean,
): Promise<void> {
  if (registry.has(name)) {
    return;
  }
  const title = await lookup.personTitle(name);
  const key = resolveNameKey(registry, name, {
    onRename: (from, to) => retargetRefs(registry, from, to),
  });
  if (key === undefined) {
    return;
  }
  if (title) {
    registry.set(key, { kind: 'name', title });
  } else if (allNames) {
    registry.set(key, { kind: 'name', title: null });
  }
}

async function addEntity(
  registry: NameRegistry,
  name: string,
  lookup: DescriptionLookup,
  allNames: boolean,
): Promise<void> {
  if (registry.has(name)) {
    return;
  }

  if (!name.includes(' ')) {
    // 'Clinton' after 'Hillary Rodham Clinton', or the possessive 'Clintons'
    const fullname =
      findFullName(registry, name) ?? (name.endsWith('s') ? findFullName(registry, name.slice(0, -1)) : undefined);
    if (fullname !== undefined) {
      registry.set(name, { kind: 'ref', fullname });
      return;
    }
  }

  const definition = await lookup.entityDefinition(name);
  if (definition) {
    registry.set(name, { kind: 'entity', title: definition });
  } else if (allNames) {
    registry.set(name, { kind: 'entity', title: null });
  }
}

/**
 * Collects the persons and entities named in `tokens` together with the
 * best known title or definition of each. Later single-word mentions of an
 * already registered multi-word name become refs to it.
 */
export async function buildNameRegistry(
  tokens: readonly QueryToken[],
  lookup: DescriptionLookup,
  options: BuildNameRegistryOptions = {},
): Promise<NameRegistry> {
  const allNames = options.allNames ?? false;
  const registry: NameRegistry = new Map<string, NameRegistryEntry>();

  for (const token of tokens) {
    if (token.kind === 'person') {
      for (const { name } of token.names) {
        await addName(registry, name, lookup, allNames);
      }
    } else if (token.kind === 'entity') {
      await addEntity(registry, token.text, lookup, allNames);
    }
  }

  log.debug({ tokens: tokens.length, entries: registry.size }, 'Name registry built');
  return registry;
}
