export interface DescribedName {
  readonly kind: 'name' | 'entity';
  readonly title: string | null;
}

/** Alias for a fuller key in the same registry, e.g. `Clinton` for `Hillary Rodham Clinton`. */
export interface NameReference {
  readonly kind: 'ref';
  readonly fullname: string;
}

export type NameRegistryEntry = DescribedName | NameReference;

export type NameRegistry = Map<string, NameRegistryEntry>;
